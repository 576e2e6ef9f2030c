import type { CellValue } from './spreadsheet';

const NON_DIGIT_PATTERN = /[^0-9]/g;
const INTEGER_TEXT_PATTERN = /^\s*([+-]?\d+)(?:\.0*)?\s*$/;

/**
 * Drops every character that is not a decimal digit and reads what is left
 * as an integer, so "49 900 zł" becomes 49900. Returns null when no digit
 * remains.
 */
export function parseDigits(text: string | null | undefined): number | null {
  if (!text) return null;
  const digits = text.replace(NON_DIGIT_PATTERN, '');
  return digits ? parseInt(digits, 10) : null;
}

/**
 * Cell coercion for the integer output columns. Whole numbers and plain
 * integer text survive; anything else becomes null.
 */
export function toNullableInteger(value: CellValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string') {
    const match = INTEGER_TEXT_PATTERN.exec(value);
    return match ? parseInt(match[1], 10) : null;
  }
  return null;
}
