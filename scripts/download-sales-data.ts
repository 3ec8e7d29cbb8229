#!/usr/bin/env ts-node
/**
 * Download NYC Annualized Sales Workbooks
 *
 * Fetches every (year, borough) workbook from the Department of Finance into
 * the raw data directory (data/raw by default), overwriting existing copies.
 * Failed downloads are logged and skipped; there are no retries.
 *
 * Usage: npm run data:download
 */

import * as path from 'path';
import { getSettings } from '../src/config/settings';
import { downloadAllSalesFiles } from '../src/services/salesDownloader';

async function main() {
  const settings = getSettings();
  console.log(`Files will be saved in: ${path.resolve(settings.rawDir)}`);

  console.log('\nStarting download of NYC Property Sales data...');
  console.log('-'.repeat(50));

  const summary = await downloadAllSalesFiles({
    baseUrl: settings.baseUrl,
    outputDir: settings.rawDir,
    timeoutMs: settings.downloadTimeoutMs,
    delayMs: settings.downloadDelayMs,
  });

  console.log('-'.repeat(50));
  console.log(
    `Download complete. ${summary.downloaded}/${summary.total} files were successfully downloaded.`
  );
  if (summary.failed.length > 0) {
    console.log(`⚠️  Not downloaded: ${summary.failed.map((t) => t.fileName).join(', ')}`);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error('❌ Download failed', err);
    process.exit(1);
  });
}
