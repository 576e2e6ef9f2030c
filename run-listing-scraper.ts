#!/usr/bin/env node
import { logError } from './server/error-utils';
import { runListingBatch } from './server/listing-batch';

export const USAGE = 'Usage: run-listing-scraper <input.xlsx> [output.xlsx]';

export async function main(args: string[]): Promise<number> {
  if (args.length < 1 || args.length > 2) {
    console.error(USAGE);
    return 1;
  }

  const [inputPath, outputPath] = args;

  try {
    const { outputPath: written, summary } = await runListingBatch(inputPath, outputPath);
    console.log(`Scraped ${summary.processed} listings (${summary.failed} failed, ${summary.skipped} rows skipped)`);
    console.log(`Done! ➜ ${written}`);
    return 0;
  } catch (error) {
    logError('[Listing Scraper] Run failed', error, { inputPath });
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => process.exit(code))
    .catch(error => {
      console.error('Failed:', error);
      process.exit(1);
    });
}
