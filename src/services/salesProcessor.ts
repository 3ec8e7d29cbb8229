/**
 * Normalizer run: every raw sales workbook -> one combined canonical file.
 * A file whose header can't be found (or that can't be read) is logged and skipped.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { CombinedSaleRecord, SaleRecord, SheetCell } from './salesSchema';
import { buildColumnAliases } from './columnAliases';
import type { ColumnAliasMap } from './columnAliases';
import { combineSalesTables, normalizeSalesSheet } from './salesNormalizer';
import type { NormalizeOptions } from './salesNormalizer';
import { listSalesFiles, readSheetRows, writeCombinedSales } from './salesWorkbook';
import { EmptyCorpusError, HeaderNotFoundError, errorMessage } from '../utils/errors';
import type { SalesSettings } from '../config/settings';

export interface ProcessingSummary {
  filesFound: number;
  filesProcessed: number;
  rowCount: number;
  /** null when nothing was written. */
  outputFile: string | null;
}

export function processSalesFile(filePath: string, options: NormalizeOptions = {}): SaleRecord[] | null {
  const fileName = path.basename(filePath);
  console.log(`Processing file: ${fileName}...`);

  let rows: SheetCell[][];
  try {
    rows = readSheetRows(filePath);
  } catch (err) {
    console.error(`  ❌ Error reading Excel file ${filePath}: ${errorMessage(err)}`);
    return null;
  }

  try {
    const records = normalizeSalesSheet(rows, { ...options, source: filePath });
    console.log(`-> Found ${records.length} rows.`);
    return records;
  } catch (err) {
    if (err instanceof HeaderNotFoundError) {
      console.warn(`⚠️  Could not process ${filePath}: ${err.message}`);
      return null;
    }
    throw err;
  }
}

export function runSalesProcessing(
  settings: Pick<SalesSettings, 'rawDir' | 'processedDir' | 'outputFile' | 'headerKeyword'>,
  aliases: ColumnAliasMap = buildColumnAliases()
): ProcessingSummary {
  fs.mkdirSync(settings.processedDir, { recursive: true });

  const files = listSalesFiles(settings.rawDir);
  if (files.length === 0) {
    console.log(`No Excel files found in ${settings.rawDir}. Please add your data files.`);
    return { filesFound: 0, filesProcessed: 0, rowCount: 0, outputFile: null };
  }

  const tables = files.map((f) => processSalesFile(f, { aliases, headerKeyword: settings.headerKeyword }));
  const filesProcessed = tables.filter((t) => t !== null).length;

  let combined: CombinedSaleRecord[];
  try {
    combined = combineSalesTables(tables);
  } catch (err) {
    if (err instanceof EmptyCorpusError) {
      console.log(err.message);
      return { filesFound: files.length, filesProcessed, rowCount: 0, outputFile: null };
    }
    throw err;
  }

  console.log('\nCombining all processed files...');
  console.log(`Total combined rows: ${combined.length}`);
  console.log(`Saving combined data to ${settings.outputFile}...`);
  writeCombinedSales(combined, settings.outputFile);

  return {
    filesFound: files.length,
    filesProcessed,
    rowCount: combined.length,
    outputFile: settings.outputFile,
  };
}
