import { HeaderNotFoundError } from '../utils/errors';

export const DEFAULT_HEADER_KEYWORD = 'BOROUGH';
export const HEADER_SCAN_ROWS = 10;

/**
 * Index of the first row (within the first `maxRows`) holding a cell whose
 * trimmed, upper-cased text equals the keyword. The sales workbooks carry a
 * title block of varying height above the column labels.
 */
export function findHeaderRow(
  rows: ReadonlyArray<ReadonlyArray<unknown>>,
  keyword: string = DEFAULT_HEADER_KEYWORD,
  maxRows: number = HEADER_SCAN_ROWS,
  source?: string
): number {
  const wanted = keyword.trim().toUpperCase();
  const limit = Math.min(rows.length, maxRows);
  for (let i = 0; i < limit; i++) {
    const row = rows[i] ?? [];
    if (row.some((cell) => cell != null && String(cell).trim().toUpperCase() === wanted)) {
      return i;
    }
  }
  throw new HeaderNotFoundError(keyword, maxRows, source);
}
