/**
 * Canonical shape of one NYC property sale, shared by every source file
 * regardless of year or borough.
 */

export const CANONICAL_FIELDS = [
  'borough',
  'neighborhood',
  'building_class_category',
  'tax_class_at_present',
  'block',
  'lot',
  'easement',
  'building_class_at_present',
  'address',
  'apartment_number',
  'zip_code',
  'residential_units',
  'commercial_units',
  'total_units',
  'land_square_feet',
  'gross_square_feet',
  'year_built',
  'tax_class_at_time_of_sale',
  'building_class_at_time_of_sale',
  'sale_price',
  'sale_date',
] as const;
export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type NumericField =
  | 'sale_price'
  | 'gross_square_feet'
  | 'land_square_feet'
  | 'residential_units'
  | 'commercial_units'
  | 'total_units'
  | 'year_built'
  | 'zip_code'
  | 'block'
  | 'lot';

export type DateField = 'sale_date';
export type TextField = Exclude<CanonicalField, NumericField | DateField>;

/** Mixes numeric-looking and alphanumeric values across years; kept as text in the combined output. */
export type ForcedTextField = 'tax_class_at_present' | 'apartment_number';

/** A cell as read from a worksheet. Empty cells are null. */
export type SheetCell = string | number | boolean | null;

export type SaleRecord = { [K in TextField]: SheetCell } & { [K in NumericField]: number | null } & {
  sale_date: Date | null;
};

export type CombinedSaleRecord = Omit<SaleRecord, ForcedTextField> & { [K in ForcedTextField]: string };

const CANONICAL_SET: ReadonlySet<string> = new Set(CANONICAL_FIELDS);

export function isCanonicalField(name: string): name is CanonicalField {
  return CANONICAL_SET.has(name);
}

export function toSheetCell(v: unknown): SheetCell {
  if (v === undefined || v === null) return null;
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString();
  return String(v);
}
