import * as cheerio from 'cheerio';
import type { ListingExtraction } from '../shared/schema';
import { describeError } from './error-utils';
import { parseDigits } from './number-utils';
import { getScraperConfig, type ScraperConfig } from './scraper-config';

export const LISTING_SELECTORS = {
  title: 'title',
  descriptionContainer: 'div.ooa-unlmzs.e11t9j224',
  metaDescription: 'meta[name="description"]',
  price: 'span.offer-price__number',
  mileage: 'span[data-testid="vehicle-mileage"]',
  detail: 'div[data-testid="detail"]',
} as const;

/**
 * One way of locating a field on the page. Returns the raw text it found,
 * or null when the page does not have the structure it looks for.
 */
export type FieldStrategy = ($: cheerio.CheerioAPI) => string | null;

export function firstMatch($: cheerio.CheerioAPI, strategies: readonly FieldStrategy[]): string | null {
  for (const strategy of strategies) {
    const value = strategy($);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

const descriptionStrategies: readonly FieldStrategy[] = [
  // Seller-written text
  ($) => {
    const container = $(LISTING_SELECTORS.descriptionContainer).first();
    if (container.length === 0) return null;

    const text = container
      .find('p')
      .map((_, paragraph) => $(paragraph).text().trim())
      .get()
      .join('\n');
    return text.trim() ? text : null;
  },
  ($) => {
    const content = $(LISTING_SELECTORS.metaDescription).first().attr('content')?.trim();
    return content ? content : null;
  },
];

const priceStrategies: readonly FieldStrategy[] = [
  ($) => {
    const price = $(LISTING_SELECTORS.price).first();
    return price.length > 0 ? price.text() : null;
  },
];

function mileageStrategies(mileageLabel: string): FieldStrategy[] {
  return [
    // A tagged mileage element wins even when it holds no digits
    ($) => {
      const mileage = $(LISTING_SELECTORS.mileage).first();
      return mileage.length > 0 ? mileage.text() : null;
    },
    // Detail rows: <p>label</p><p>value</p>
    ($) => {
      for (const detail of $(LISTING_SELECTORS.detail).toArray()) {
        const paragraphs = $(detail).find('p');
        if (paragraphs.length < 2) continue;

        if (paragraphs.eq(0).text().trim().includes(mileageLabel)) {
          return paragraphs.eq(1).text().trim();
        }
      }
      return null;
    },
  ];
}

export function emptyExtraction(error: string): ListingExtraction {
  return {
    title: '',
    mileage: null,
    price: null,
    description: '',
    error,
  };
}

export function extractListingDetails(
  html: string,
  config: Pick<ScraperConfig, 'mileageLabel'> = getScraperConfig()
): ListingExtraction {
  const $ = cheerio.load(html);

  return {
    title: $(LISTING_SELECTORS.title).first().text().trim(),
    mileage: parseDigits(firstMatch($, mileageStrategies(config.mileageLabel))),
    price: parseDigits(firstMatch($, priceStrategies)),
    description: firstMatch($, descriptionStrategies) ?? '',
    error: '',
  };
}

export async function fetchListingHtml(
  url: string,
  config: Pick<ScraperConfig, 'userAgent' | 'timeoutMs'>
): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);

  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': config.userAgent },
      signal: controller.signal,
    });

    if (!response.ok) {
      const status = response.statusText ? `${response.status} ${response.statusText}` : `${response.status}`;
      throw new Error(`HTTP ${status} for url: ${url}`);
    }

    return await response.text();
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${config.timeoutMs}ms for url: ${url}`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetches a listing page and extracts its fields. Never rejects: a failed
 * request comes back as an empty extraction carrying the error message.
 */
export async function scrapeListing(
  url: string,
  config: ScraperConfig = getScraperConfig()
): Promise<ListingExtraction> {
  try {
    const html = await fetchListingHtml(url, config);
    return extractListingDetails(html, config);
  } catch (error) {
    return emptyExtraction(describeError(error));
  }
}
