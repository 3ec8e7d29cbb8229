/**
 * Sheet -> canonical records, and the cross-file combine step.
 *
 * normalizeSalesSheet is pure: raw worksheet rows in, canonical records out.
 * Locate the header and rename columns once per sheet; then, per data row,
 * project to the canonical set (missing columns -> null), coerce numbers and
 * dates, and drop the row if nothing is left in it.
 */
import { CANONICAL_FIELDS, isCanonicalField, toSheetCell } from './salesSchema';
import type { CanonicalField, CombinedSaleRecord, SaleRecord, SheetCell } from './salesSchema';
import { COLUMN_ALIASES, canonicalizeColumns } from './columnAliases';
import type { ColumnAliasMap } from './columnAliases';
import { DEFAULT_HEADER_KEYWORD, HEADER_SCAN_ROWS, findHeaderRow } from './headerLocator';
import { toNumeric, toSaleDate, toText } from '../utils/coerce';
import { EmptyCorpusError } from '../utils/errors';

export interface NormalizeOptions {
  headerKeyword?: string;
  headerScanRows?: number;
  aliases?: ColumnAliasMap;
  /** File name or path, used in error messages. */
  source?: string;
}

/** Column index per canonical field; the leftmost source column wins on duplicates. */
function indexCanonicalColumns(labels: string[]): Map<CanonicalField, number> {
  const index = new Map<CanonicalField, number>();
  labels.forEach((label, i) => {
    if (isCanonicalField(label) && !index.has(label)) index.set(label, i);
  });
  return index;
}

/** Field-by-field coercion; SaleRecord fixes which fields must come out numeric. */
function buildRecord(get: (field: CanonicalField) => SheetCell): SaleRecord {
  return {
    borough: get('borough'),
    neighborhood: get('neighborhood'),
    building_class_category: get('building_class_category'),
    tax_class_at_present: get('tax_class_at_present'),
    block: toNumeric(get('block')),
    lot: toNumeric(get('lot')),
    easement: get('easement'),
    building_class_at_present: get('building_class_at_present'),
    address: get('address'),
    apartment_number: get('apartment_number'),
    zip_code: toNumeric(get('zip_code')),
    residential_units: toNumeric(get('residential_units')),
    commercial_units: toNumeric(get('commercial_units')),
    total_units: toNumeric(get('total_units')),
    land_square_feet: toNumeric(get('land_square_feet')),
    gross_square_feet: toNumeric(get('gross_square_feet')),
    year_built: toNumeric(get('year_built')),
    tax_class_at_time_of_sale: get('tax_class_at_time_of_sale'),
    building_class_at_time_of_sale: get('building_class_at_time_of_sale'),
    sale_price: toNumeric(get('sale_price')),
    sale_date: toSaleDate(get('sale_date')),
  };
}

export function isEmptyRecord(record: SaleRecord): boolean {
  return CANONICAL_FIELDS.every((field) => record[field] === null);
}

export function normalizeSalesSheet(
  rows: ReadonlyArray<ReadonlyArray<unknown>>,
  options: NormalizeOptions = {}
): SaleRecord[] {
  const headerIndex = findHeaderRow(
    rows,
    options.headerKeyword ?? DEFAULT_HEADER_KEYWORD,
    options.headerScanRows ?? HEADER_SCAN_ROWS,
    options.source
  );
  const labels = canonicalizeColumns(rows[headerIndex] ?? [], options.aliases ?? COLUMN_ALIASES);
  const columnIndex = indexCanonicalColumns(labels);

  const records: SaleRecord[] = [];
  for (const row of rows.slice(headerIndex + 1)) {
    const record = buildRecord((field) => {
      const i = columnIndex.get(field);
      if (i === undefined) return null;
      const cell = toSheetCell(row[i]);
      return cell === '' ? null : cell;
    });
    if (!isEmptyRecord(record)) records.push(record);
  }
  return records;
}

/**
 * Concatenate per-file outputs in order (null = skipped file), then force the
 * mixed-type columns to text. Throws EmptyCorpusError when no file produced output.
 */
export function combineSalesTables(tables: ReadonlyArray<SaleRecord[] | null>): CombinedSaleRecord[] {
  const kept = tables.filter((t): t is SaleRecord[] => t !== null);
  if (kept.length === 0) throw new EmptyCorpusError();

  return kept.flat().map((record) => ({
    ...record,
    tax_class_at_present: toText(record.tax_class_at_present),
    apartment_number: toText(record.apartment_number),
  }));
}
