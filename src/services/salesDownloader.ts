/**
 * Fetcher for the annualized sales workbooks: one GET per (year, borough),
 * sequential, fixed pause after every attempt, no retries.
 */
import * as fs from 'fs';
import * as path from 'path';
import { DownloadError, errorMessage } from '../utils/errors';
import {
  DEFAULT_BASE_URL,
  DEFAULT_DOWNLOAD_DELAY_MS,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
} from '../config/settings';

export const SALES_YEARS: readonly number[] = Array.from({ length: 7 }, (_, i) => 2018 + i);
export const BOROUGHS = ['manhattan', 'bronx', 'brooklyn', 'queens', 'staten_island'] as const;
export type Borough = (typeof BOROUGHS)[number];

export interface SalesFileTarget {
  year: number;
  borough: Borough;
  fileName: string;
  url: string;
}

export interface DownloadOptions {
  baseUrl?: string;
  outputDir: string;
  timeoutMs?: number;
  delayMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface DownloadSummary {
  downloaded: number;
  total: number;
  failed: SalesFileTarget[];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Underscore form for every borough, staten_island included. */
export function buildSalesFileName(year: number, borough: Borough): string {
  return `${year}_${borough}.xlsx`;
}

export function buildSalesFileUrl(year: number, borough: Borough, baseUrl: string = DEFAULT_BASE_URL): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${year}/${buildSalesFileName(year, borough)}`;
}

/** Year-major: every borough of 2018, then 2019, ... */
export function listSalesFileTargets(baseUrl: string = DEFAULT_BASE_URL): SalesFileTarget[] {
  return SALES_YEARS.flatMap((year) =>
    BOROUGHS.map((borough) => ({
      year,
      borough,
      fileName: buildSalesFileName(year, borough),
      url: buildSalesFileUrl(year, borough, baseUrl),
    }))
  );
}

/** GET url into filePath (overwriting). Throws DownloadError on non-200, fetch's error on transport failure/timeout. */
export async function fetchToFile(
  url: string,
  filePath: string,
  timeoutMs: number = DEFAULT_DOWNLOAD_TIMEOUT_MS,
  fetchImpl: typeof fetch = fetch
): Promise<void> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error(`timeout after ${timeoutMs}ms`)), timeoutMs);
  try {
    const res = await fetchImpl(url, { method: 'GET', signal: controller.signal });
    if (res.status !== 200) throw new DownloadError(res.status, url);
    const buffer = Buffer.from(await res.arrayBuffer());
    fs.writeFileSync(filePath, buffer);
  } finally {
    clearTimeout(timeout);
  }
}

/** true when saved; failures are logged, never thrown. */
export async function downloadFile(
  url: string,
  filePath: string,
  timeoutMs?: number,
  fetchImpl?: typeof fetch
): Promise<boolean> {
  try {
    await fetchToFile(url, filePath, timeoutMs, fetchImpl);
    console.log(`  ✅ SUCCESS: Saved to ${path.basename(filePath)}`);
    return true;
  } catch (err) {
    if (err instanceof DownloadError) {
      console.error(`  ❌ FAILED: ${err.message}`);
    } else {
      console.error(`  ❌ FAILED: An error occurred: ${errorMessage(err)}`);
    }
    return false;
  }
}

export async function downloadAllSalesFiles(options: DownloadOptions): Promise<DownloadSummary> {
  const targets = listSalesFileTargets(options.baseUrl);
  const delayMs = options.delayMs ?? DEFAULT_DOWNLOAD_DELAY_MS;
  const wait = options.sleep ?? sleep;
  fs.mkdirSync(options.outputDir, { recursive: true });

  let downloaded = 0;
  const failed: SalesFileTarget[] = [];
  for (const target of targets) {
    console.log(`Downloading ${target.fileName}...`);
    const ok = await downloadFile(
      target.url,
      path.join(options.outputDir, target.fileName),
      options.timeoutMs,
      options.fetchImpl
    );
    if (ok) downloaded++;
    else failed.push(target);

    await wait(delayMs);
  }

  return { downloaded, total: targets.length, failed };
}
