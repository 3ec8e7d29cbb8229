/**
 * Workbook I/O via SheetJS: read a sales sheet as raw rows, list the raw
 * directory, write the combined dataset.
 */
import * as fs from 'fs';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { CANONICAL_FIELDS, toSheetCell } from './salesSchema';
import type { CombinedSaleRecord, SheetCell } from './salesSchema';
import { formatIsoDate } from '../utils/coerce';

export const OUTPUT_SHEET_NAME = 'sales';

/**
 * First sheet as an array of rows. Blank rows are kept so row indices match
 * the sheet; dates stay as Excel serial numbers.
 */
export function readSheetRows(filePath: string): SheetCell[][] {
  const workbook = XLSX.readFile(filePath);
  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) return [];
  const data = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: true,
    raw: true,
  });
  return data.map((row) => (Array.isArray(row) ? row.map(toSheetCell) : []));
}

/** *.xlsx files in directory listing order, skipping Office lock files. Missing dir -> []. */
export function listSalesFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.xlsx') && !f.startsWith('~'))
    .map((f) => path.join(dir, f));
}

type OutputRow = Record<string, string | number | boolean | null>;

function toOutputRow(record: CombinedSaleRecord): OutputRow {
  const row: OutputRow = {};
  for (const field of CANONICAL_FIELDS) {
    const value = record[field];
    row[field] = value instanceof Date ? formatIsoDate(value) : value;
  }
  return row;
}

export function buildSalesSheet(records: ReadonlyArray<CombinedSaleRecord>): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet(records.map(toOutputRow), { header: [...CANONICAL_FIELDS] });
}

/** CSV when the file ends in .csv, otherwise a workbook in the format its extension names. */
export function writeCombinedSales(records: ReadonlyArray<CombinedSaleRecord>, outputFile: string): void {
  fs.mkdirSync(path.dirname(outputFile), { recursive: true });
  const worksheet = buildSalesSheet(records);

  if (path.extname(outputFile).toLowerCase() === '.csv') {
    fs.writeFileSync(outputFile, XLSX.utils.sheet_to_csv(worksheet) + '\n', 'utf8');
    return;
  }

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, OUTPUT_SHEET_NAME);
  XLSX.writeFile(workbook, outputFile);
}
