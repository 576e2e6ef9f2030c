import { z } from "zod";

// Spreadsheet column headers written by the scraper. A run reuses a column
// that already carries one of these names instead of adding a second one.
export const LISTING_COLUMNS = {
  title: "Title",
  mileage: "mileage",
  price: "Price",
  description: "Description",
  error: "Error",
} as const;

export type ListingField = keyof typeof LISTING_COLUMNS;
export type ListingColumn = typeof LISTING_COLUMNS[ListingField];

export const LISTING_FIELDS: readonly ListingField[] = [
  "title",
  "mileage",
  "price",
  "description",
  "error",
];

// Columns holding whole numbers once a batch finishes.
export const INTEGER_COLUMNS: readonly ListingColumn[] = [
  LISTING_COLUMNS.mileage,
  LISTING_COLUMNS.price,
];

/**
 * Fields scraped from one listing page. When `error` is non-empty the fetch
 * failed and every other field holds its empty placeholder.
 */
export const listingExtractionSchema = z.object({
  title: z.string(),
  mileage: z.number().int().nullable(),
  price: z.number().int().nullable(),
  description: z.string(),
  error: z.string(),
});

export type ListingExtraction = z.infer<typeof listingExtractionSchema>;
