#!/usr/bin/env ts-node
/**
 * Process NYC Sales Workbooks
 *
 * Normalizes every workbook in the raw data directory onto the canonical
 * 21-column sales schema and writes one combined file
 * (data/processed/nyc_sales_combined.csv by default).
 *
 * New header variants go in src/config/column-alias-overrides.json.
 *
 * Usage: npm run data:process
 */

import { getSettings } from '../src/config/settings';
import { runSalesProcessing } from '../src/services/salesProcessor';

function main() {
  const settings = getSettings();
  const summary = runSalesProcessing(settings);
  if (!summary.outputFile) return;

  console.log(`\n📊 ${summary.filesProcessed}/${summary.filesFound} files processed, ${summary.rowCount} rows.`);
  console.log('✅ Processing complete! Your clean data is ready.');
}

if (require.main === module) {
  try {
    main();
  } catch (err) {
    console.error('❌ Processing failed', err);
    process.exit(1);
  }
}
