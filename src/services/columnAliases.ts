/**
 * Column alias table: cleaned source header text -> canonical field.
 * Runtime overrides: src/config/column-alias-overrides.json ({ "<header>": "<field>" }),
 * layered over the static table on each run. Add new header variants there first.
 */
import fs from 'fs';
import path from 'path';
import { isCanonicalField } from './salesSchema';
import type { CanonicalField } from './salesSchema';
import { errorMessage } from '../utils/errors';

export type ColumnAliasMap = Readonly<Record<string, CanonicalField>>;

export const DEFAULT_OVERRIDES_PATH = path.join(__dirname, '../config/column-alias-overrides.json');

export const COLUMN_ALIASES: ColumnAliasMap = Object.freeze({
  borough: 'borough',
  neighborhood: 'neighborhood',
  'building class category': 'building_class_category',
  'tax class as of final roll 18/19': 'tax_class_at_present',
  'tax class at present': 'tax_class_at_present',
  block: 'block',
  lot: 'lot',
  'ease-ment': 'easement', // sic, several years ship the typo
  'building class as of final roll 18/19': 'building_class_at_present',
  'building class at present': 'building_class_at_present',
  address: 'address',
  'apartment number': 'apartment_number',
  'zip code': 'zip_code',
  'residential units': 'residential_units',
  'commercial units': 'commercial_units',
  'total units': 'total_units',
  'land square feet': 'land_square_feet',
  'gross square feet': 'gross_square_feet',
  'year built': 'year_built',
  'tax class at time of sale': 'tax_class_at_time_of_sale',
  'building class at time of sale': 'building_class_at_time_of_sale',
  'sale price': 'sale_price',
  'sale date': 'sale_date',
});

/** Collapse whitespace runs (including embedded newlines), trim, lower-case. */
export function cleanColumnName(label: unknown): string {
  if (label == null) return '';
  return String(label).replace(/\s+/g, ' ').trim().toLowerCase();
}

export function canonicalizeColumns(
  labels: ReadonlyArray<unknown>,
  aliases: ColumnAliasMap = COLUMN_ALIASES
): string[] {
  return labels.map((label) => {
    const cleaned = cleanColumnName(label);
    return Object.prototype.hasOwnProperty.call(aliases, cleaned) ? aliases[cleaned] : cleaned;
  });
}

/** Read runtime overrides. Missing or unreadable file -> {}; entries naming an unknown field are skipped. */
export function loadColumnAliasOverrides(filePath: string = DEFAULT_OVERRIDES_PATH): Record<string, CanonicalField> {
  if (!fs.existsSync(filePath)) return {};
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    console.warn(`⚠️  Could not read column alias overrides ${filePath}: ${errorMessage(err)}`);
    return {};
  }
  if (!data || typeof data !== 'object' || Array.isArray(data)) return {};

  const overrides: Record<string, CanonicalField> = {};
  for (const [header, field] of Object.entries(data)) {
    if (typeof field === 'string' && isCanonicalField(field)) {
      overrides[cleanColumnName(header)] = field;
    } else {
      console.warn(`⚠️  Ignoring alias override '${header}': '${String(field)}' is not a canonical column`);
    }
  }
  return overrides;
}

export function buildColumnAliases(overridesPath: string = DEFAULT_OVERRIDES_PATH): ColumnAliasMap {
  return Object.freeze({ ...COLUMN_ALIASES, ...loadColumnAliasOverrides(overridesPath) });
}
