import path from 'path';
import {
  INTEGER_COLUMNS,
  LISTING_COLUMNS,
  LISTING_FIELDS,
  listingExtractionSchema,
  type ListingExtraction,
} from '../shared/schema';
import { fromZodError } from 'zod-validation-error';
import { describeError, logInfo, logWarn } from './error-utils';
import { emptyExtraction, scrapeListing } from './listing-extractor';
import { toNullableInteger } from './number-utils';
import { getScraperConfig } from './scraper-config';
import {
  detectFormat,
  readSpreadsheet,
  SpreadsheetError,
  writeSpreadsheet,
  type CellValue,
  type SheetRow,
  type SheetTable,
} from './spreadsheet';

export type ListingScraper = (url: string) => Promise<ListingExtraction>;

export interface ScrapeTableOptions {
  scrape?: ListingScraper;
  throttleMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchSummary {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface BatchRunResult {
  outputPath: string;
  summary: BatchSummary;
}

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function defaultOutputPath(inputPath: string, suffix: string): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.join(dir, `${name}${suffix}${ext}`);
}

export function ensureOutputColumns(table: SheetTable): void {
  for (const field of LISTING_FIELDS) {
    const column = LISTING_COLUMNS[field];
    if (!table.columns.includes(column)) {
      table.columns.push(column);
    }
  }
}

function readUrl(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const url = String(value).trim();
  return url || null;
}

function applyExtraction(row: SheetRow, result: ListingExtraction): void {
  for (const field of LISTING_FIELDS) {
    row[LISTING_COLUMNS[field]] = result[field];
  }
}

function coerceIntegerColumns(table: SheetTable): void {
  for (const row of table.rows) {
    for (const column of INTEGER_COLUMNS) {
      if (column in row) {
        row[column] = toNullableInteger(row[column]);
      }
    }
  }
}

async function scrapeRow(scrape: ListingScraper, url: string): Promise<ListingExtraction> {
  let scraped: ListingExtraction;
  try {
    scraped = await scrape(url);
  } catch (error) {
    return emptyExtraction(describeError(error));
  }

  const parsed = listingExtractionSchema.safeParse(scraped);
  if (!parsed.success) {
    return emptyExtraction(`Invalid extraction for ${url}: ${fromZodError(parsed.error).message}`);
  }
  return parsed.data;
}

/**
 * Scrapes every row whose first column holds a URL, one request at a time,
 * and writes the extracted fields into that row. Rows without a URL are left
 * as they are.
 */
export async function scrapeTable(table: SheetTable, options: ScrapeTableOptions = {}): Promise<BatchSummary> {
  if (table.columns.length === 0) {
    throw new SpreadsheetError('Input table has no columns; the first column must hold listing URLs');
  }

  const scrape = options.scrape ?? ((url: string) => scrapeListing(url));
  const throttleMs = options.throttleMs ?? getScraperConfig().throttleMs;
  const wait = options.sleep ?? sleep;

  const urlColumn = table.columns[0];
  ensureOutputColumns(table);

  const summary: BatchSummary = {
    total: table.rows.length,
    processed: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
  };

  for (const [index, row] of table.rows.entries()) {
    const url = readUrl(row[urlColumn]);
    if (!url) {
      summary.skipped++;
      continue;
    }

    if (summary.processed > 0 && throttleMs > 0) {
      await wait(throttleMs);
    }

    summary.processed++;
    logInfo(`[Listing Batch] Scraping row ${index + 1}/${summary.total}`, { row: index + 1, url });

    const result = await scrapeRow(scrape, url);
    applyExtraction(row, result);

    if (result.error) {
      summary.failed++;
      logWarn(`[Listing Batch] Row ${index + 1} failed`, { row: index + 1, url, error: result.error });
    } else {
      summary.succeeded++;
    }
  }

  coerceIntegerColumns(table);
  return summary;
}

export async function runListingBatch(
  inputPath: string,
  outputPath?: string,
  options: ScrapeTableOptions = {}
): Promise<BatchRunResult> {
  const target = outputPath ?? defaultOutputPath(inputPath, getScraperConfig().outputSuffix);
  // Unsupported output type is rejected before any fetch
  detectFormat(target);

  logInfo(`[Listing Batch] Reading ${inputPath}`);
  const table = await readSpreadsheet(inputPath);
  logInfo(`[Listing Batch] Loaded ${table.rows.length} rows`, { inputPath, columns: table.columns });

  const summary = await scrapeTable(table, options);

  logInfo(`[Listing Batch] Writing ${target}`);
  await writeSpreadsheet(target, table);
  logInfo('[Listing Batch] Done', { outputPath: target, ...summary });

  return { outputPath: target, summary };
}
