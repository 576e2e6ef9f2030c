import { ConfigError, getScraperConfig, loadScraperConfig } from '../scraper-config';

describe('Scraper Config', () => {
  it('should apply defaults when nothing is set', () => {
    expect(loadScraperConfig({})).toEqual({
      userAgent: 'Mozilla/5.0',
      timeoutMs: 10000,
      throttleMs: 1000,
      mileageLabel: 'Przebieg',
      outputSuffix: '_scraped',
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadScraperConfig({
      LISTING_SCRAPER_USER_AGENT: 'test-agent/1.0',
      LISTING_SCRAPER_TIMEOUT_MS: '2500',
      LISTING_SCRAPER_THROTTLE_MS: '0',
      LISTING_SCRAPER_MILEAGE_LABEL: 'Mileage',
      LISTING_SCRAPER_OUTPUT_SUFFIX: '-out',
    });

    expect(config).toEqual({
      userAgent: 'test-agent/1.0',
      timeoutMs: 2500,
      throttleMs: 0,
      mileageLabel: 'Mileage',
      outputSuffix: '-out',
    });
  });

  it('should treat blank variables as unset', () => {
    const config = loadScraperConfig({
      LISTING_SCRAPER_TIMEOUT_MS: '',
      LISTING_SCRAPER_THROTTLE_MS: '  ',
      LISTING_SCRAPER_USER_AGENT: '',
    });

    expect(config.timeoutMs).toBe(10000);
    expect(config.throttleMs).toBe(1000);
    expect(config.userAgent).toBe('Mozilla/5.0');
  });

  it('should return a frozen config', () => {
    expect(Object.isFrozen(loadScraperConfig({}))).toBe(true);
  });

  it('should reject a non-positive timeout', () => {
    expect(() => loadScraperConfig({ LISTING_SCRAPER_TIMEOUT_MS: '0' })).toThrow(ConfigError);
    expect(() => loadScraperConfig({ LISTING_SCRAPER_TIMEOUT_MS: '0' })).toThrow(/LISTING_SCRAPER_TIMEOUT_MS/);
  });

  it('should reject a throttle that is not a whole number', () => {
    expect(() => loadScraperConfig({ LISTING_SCRAPER_THROTTLE_MS: 'soon' })).toThrow(ConfigError);
    expect(() => loadScraperConfig({ LISTING_SCRAPER_THROTTLE_MS: '1.5' })).toThrow(ConfigError);
  });

  it('should share one process-wide instance', () => {
    expect(getScraperConfig()).toBe(getScraperConfig());
  });
});
