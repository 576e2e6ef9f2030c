import { access, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { main, USAGE } from '../../run-listing-scraper';

describe('run-listing-scraper CLI', () => {
  let errorSpy: jest.SpyInstance;
  let workDir: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    workDir = await mkdtemp(path.join(os.tmpdir(), 'listing-cli-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  it('should print usage and exit 1 without arguments', async () => {
    await expect(main([])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(USAGE);
  });

  it('should print usage and exit 1 with too many arguments', async () => {
    await expect(main(['in.xlsx', 'out.xlsx', 'extra'])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(USAGE);
  });

  it('should exit 1 when the input cannot be read', async () => {
    await expect(main([path.join(workDir, 'missing.csv')])).resolves.toBe(1);

    const entry = JSON.parse(errorSpy.mock.calls[0][0]);
    expect(entry.message).toBe('[Listing Scraper] Run failed');
    expect(entry.error).toContain('Cannot read spreadsheet');
  });

  it('should exit 0 when rows fail to fetch', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const input = path.join(workDir, 'cars.csv');
    await writeFile(input, 'url\nhttps://a.test/1\n', 'utf8');

    await expect(main([input])).resolves.toBe(0);
    await expect(access(path.join(workDir, 'cars_scraped.csv'))).resolves.toBeUndefined();
  });
});
