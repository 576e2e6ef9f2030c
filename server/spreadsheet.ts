import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import * as ExcelJS from 'exceljs';
import Papa from 'papaparse';
import { describeError } from './error-utils';

export type CellValue = string | number | boolean | Date | null;
export type SheetRow = Record<string, CellValue>;

/**
 * A worksheet held in memory. Rows are keyed by header; `columns` keeps the
 * header order used when the table is written back.
 */
export interface SheetTable {
  columns: string[];
  rows: SheetRow[];
}

export type SpreadsheetFormat = 'xlsx' | 'csv';

export class SpreadsheetError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SpreadsheetError';
  }
}

const OUTPUT_SHEET_NAME = 'Sheet1';

export function detectFormat(filePath: string): SpreadsheetFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.xlsx') return 'xlsx';
  if (extension === '.csv') return 'csv';
  throw new SpreadsheetError(`Unsupported spreadsheet type "${extension || filePath}", expected .xlsx or .csv`);
}

function headerText(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

/**
 * Blank headers become Column<n>; repeated headers get .1, .2 ... suffixes.
 */
export function normalizeHeaders(raw: readonly CellValue[]): string[] {
  const seen = new Set<string>();

  return raw.map((value, index) => {
    const base = headerText(value) || `Column${index + 1}`;
    let name = base;
    let suffix = 1;
    while (seen.has(name)) {
      name = `${base}.${suffix++}`;
    }
    seen.add(name);
    return name;
  });
}

export function buildTable(header: readonly CellValue[], records: readonly CellValue[][]): SheetTable {
  const width = records.reduce((widest, record) => Math.max(widest, record.length), header.length);
  const paddedHeader = Array.from({ length: width }, (_, i) => header[i] ?? null);
  const columns = normalizeHeaders(paddedHeader);

  const rows = records.map(record => {
    const row: SheetRow = {};
    columns.forEach((column, i) => {
      row[column] = record[i] ?? null;
    });
    return row;
  });

  return { columns, rows };
}

// Link text with formatting is read back as { richText: [...] }
function hyperlinkText(text: unknown): CellValue {
  if (typeof text === 'string') return text === '' ? null : text;
  if (typeof text !== 'object' || text === null || !('richText' in text) || !Array.isArray(text.richText)) {
    return null;
  }

  const joined = text.richText
    .map((part: unknown) =>
      typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string' ? part.text : ''
    )
    .join('');
  return joined === '' ? null : joined;
}

export function normalizeCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined || value === '') return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;

  if ('richText' in value) {
    return value.richText.map(part => part.text).join('');
  }
  if ('hyperlink' in value) {
    return hyperlinkText(value.text);
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : normalizeCellValue(value.result);
  }
  // Error cells (#N/A, #REF! ...)
  return null;
}

async function readXlsx(filePath: string): Promise<SheetTable> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new SpreadsheetError(`Cannot read spreadsheet ${filePath}: ${describeError(error)}`, { cause: error });
  }

  if (workbook.worksheets.length === 0) {
    throw new SpreadsheetError(`Spreadsheet ${filePath} has no worksheets`);
  }

  const records: CellValue[][] = [];
  workbook.worksheets[0].eachRow(row => {
    const values: CellValue[] = [];
    for (let column = 1; column <= row.cellCount; column++) {
      values.push(normalizeCellValue(row.getCell(column).value));
    }
    records.push(values);
  });

  if (records.length === 0) {
    throw new SpreadsheetError(`Spreadsheet ${filePath} has no header row`);
  }

  const [header, ...data] = records;
  return buildTable(header, data);
}

async function readCsv(filePath: string): Promise<SheetTable> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new SpreadsheetError(`Cannot read spreadsheet ${filePath}: ${describeError(error)}`, { cause: error });
  }

  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), { skipEmptyLines: 'greedy' });

  // A single-column file has no delimiter to detect; Papa falls back to a comma.
  const problems = result.errors.filter(problem => problem.type !== 'Delimiter');
  if (problems.length > 0) {
    const [first] = problems;
    throw new SpreadsheetError(`Malformed CSV in ${filePath} at row ${first.row}: ${first.message}`);
  }

  if (result.data.length === 0) {
    throw new SpreadsheetError(`Spreadsheet ${filePath} has no header row`);
  }

  const [header, ...data] = result.data.map(record =>
    record.map(cell => (cell === '' ? null : cell))
  );
  return buildTable(header, data);
}

export async function readSpreadsheet(filePath: string): Promise<SheetTable> {
  return detectFormat(filePath) === 'xlsx' ? readXlsx(filePath) : readCsv(filePath);
}

function cellsInOrder(table: SheetTable, row: SheetRow): CellValue[] {
  return table.columns.map(column => row[column] ?? null);
}

async function writeXlsx(filePath: string, table: SheetTable): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(OUTPUT_SHEET_NAME);

  sheet.addRow(table.columns);
  for (const row of table.rows) {
    sheet.addRow(cellsInOrder(table, row));
  }

  await workbook.xlsx.writeFile(filePath);
}

function toCsvCell(value: CellValue): string | number | boolean {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return value;
}

async function writeCsv(filePath: string, table: SheetTable): Promise<void> {
  const csv = Papa.unparse({
    fields: table.columns,
    data: table.rows.map(row => cellsInOrder(table, row).map(toCsvCell)),
  });
  await writeFile(filePath, `${csv}\r\n`, 'utf8');
}

export async function writeSpreadsheet(filePath: string, table: SheetTable): Promise<void> {
  if (detectFormat(filePath) === 'xlsx') {
    await writeXlsx(filePath, table);
  } else {
    await writeCsv(filePath, table);
  }
}
