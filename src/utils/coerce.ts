/**
 * Lenient cell coercion. Nothing here throws: a value that cannot be read as
 * the target type becomes null.
 */

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;
// Day zero of the 1900 date system, after Excel's phantom 1900-02-29.
const EXCEL_EPOCH_UTC = Date.UTC(1899, 11, 30);
// Trailing Z, GMT/UTC, or a numeric offset after a time, optionally followed by "(zone name)".
const EXPLICIT_ZONE =
  /(?:Z|\b(?:GMT|UTC)|\d:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:GMT|UTC)?\s*[+-]\d{2}:?\d{2})(?:\s*\([^)]*\))?$/;

export function toNumeric(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v !== 'string') return null;
  const trimmed = v.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) return null;
  const parsed = parseFloat(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function utcDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Rejects rollovers such as 2/30
  if (date.getUTCMonth() !== month - 1) return null;
  return date;
}

export function excelSerialToDate(serial: number): Date | null {
  if (!Number.isFinite(serial) || serial < 1) return null;
  return new Date(EXCEL_EPOCH_UTC + Math.floor(serial) * MS_PER_DAY);
}

/** Calendar date at UTC midnight, from an Excel serial, a Date, or a date string. */
export function toSaleDate(v: unknown): Date | null {
  if (v == null || v === '') return null;
  if (v instanceof Date) {
    if (Number.isNaN(v.getTime())) return null;
    return new Date(Date.UTC(v.getUTCFullYear(), v.getUTCMonth(), v.getUTCDate()));
  }
  if (typeof v === 'number') return excelSerialToDate(v);
  if (typeof v !== 'string') return null;

  const s = v.trim();
  if (!s) return null;

  let m = s.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/);
  if (m) return utcDate(+m[1], +m[2], +m[3]);

  m = s.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})(?:\s.*)?$/);
  if (m) {
    let year = +m[3];
    if (m[3].length === 2) year += year < 50 ? 2000 : 1900;
    return utcDate(year, +m[1], +m[2]);
  }

  // Bare numbers in text are not dates
  if (DECIMAL_LITERAL.test(s)) return null;

  const t = Date.parse(s);
  if (Number.isNaN(t)) return null;
  const parsed = new Date(t);
  // Zoned strings are read on the UTC calendar; bare ones were parsed as local wall-clock time.
  if (EXPLICIT_ZONE.test(s)) {
    return new Date(Date.UTC(parsed.getUTCFullYear(), parsed.getUTCMonth(), parsed.getUTCDate()));
  }
  return new Date(Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate()));
}

export function formatIsoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Forced-text rendering: null -> '', numbers as decimal text, booleans as 'true' / 'false', dates as YYYY-MM-DD. */
export function toText(v: unknown): string {
  if (v == null) return '';
  if (typeof v === 'number') return Number.isFinite(v) ? String(v) : '';
  if (typeof v === 'boolean') return v ? 'true' : 'false';
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? '' : formatIsoDate(v);
  return String(v);
}
