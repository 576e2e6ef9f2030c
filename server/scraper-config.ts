import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

export interface ScraperConfig {
  readonly userAgent: string;
  readonly timeoutMs: number;
  readonly throttleMs: number;
  readonly mileageLabel: string;
  readonly outputSuffix: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// `VAR=` in a .env file counts as unset
const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const scraperEnvSchema = z.object({
  LISTING_SCRAPER_USER_AGENT: z.preprocess(blankAsUnset, z.string().trim().min(1).default('Mozilla/5.0')),
  LISTING_SCRAPER_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(10000)),
  LISTING_SCRAPER_THROTTLE_MS: z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(1000)),
  LISTING_SCRAPER_MILEAGE_LABEL: z.preprocess(blankAsUnset, z.string().trim().min(1).default('Przebieg')),
  LISTING_SCRAPER_OUTPUT_SUFFIX: z.preprocess(blankAsUnset, z.string().default('_scraped')),
});

export function loadScraperConfig(env: NodeJS.ProcessEnv): ScraperConfig {
  const parsed = scraperEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(fromZodError(parsed.error).message);
  }

  return Object.freeze({
    userAgent: parsed.data.LISTING_SCRAPER_USER_AGENT,
    timeoutMs: parsed.data.LISTING_SCRAPER_TIMEOUT_MS,
    throttleMs: parsed.data.LISTING_SCRAPER_THROTTLE_MS,
    mileageLabel: parsed.data.LISTING_SCRAPER_MILEAGE_LABEL,
    outputSuffix: parsed.data.LISTING_SCRAPER_OUTPUT_SUFFIX,
  });
}

let processConfig: ScraperConfig | null = null;

// Read from process.env on first use, then shared for the life of the process.
export function getScraperConfig(): ScraperConfig {
  if (!processConfig) {
    processConfig = loadScraperConfig(process.env);
  }
  return processConfig;
}
