/**
 * Runtime settings. Every value has a built-in default, so no .env is required;
 * a .env (cwd, its parent, or the project root) may override any of them.
 */
import dotenv from 'dotenv';
import path from 'path';
import { existsSync } from 'fs';
import { DEFAULT_HEADER_KEYWORD } from '../services/headerLocator';

export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

export const DEFAULT_BASE_URL =
  'https://www.nyc.gov/assets/finance/downloads/pdf/rolling_sales/annualized-sales/';
export const DEFAULT_OUTPUT_FILE_NAME = 'nyc_sales_combined.csv';
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 30_000;
export const DEFAULT_DOWNLOAD_DELAY_MS = 1_000;

export interface SalesSettings {
  baseUrl: string;
  rawDir: string;
  processedDir: string;
  outputFile: string;
  downloadTimeoutMs: number;
  downloadDelayMs: number;
  headerKeyword: string;
}

let envLoaded = false;

export function loadEnv(): void {
  if (envLoaded) return;
  envLoaded = true;

  const possibleEnvPaths = [
    path.resolve(process.cwd(), '.env'),
    path.resolve(process.cwd(), '../.env'),
    path.resolve(PROJECT_ROOT, '.env'),
  ];
  for (const envPath of possibleEnvPaths) {
    if (existsSync(envPath) && !dotenv.config({ path: envPath }).error) {
      console.log(`✅ Loaded .env from: ${envPath}`);
      return;
    }
  }
  dotenv.config();
}

function nonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) return fallback;
  return parseInt(raw, 10);
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/** Pure: resolve settings from an environment map (defaults for anything unset or invalid). */
export function resolveSettings(env: NodeJS.ProcessEnv = process.env): SalesSettings {
  const rawDir = path.resolve(PROJECT_ROOT, nonEmpty(env.SALES_RAW_DIR) ?? path.join('data', 'raw'));
  const processedDir = path.resolve(
    PROJECT_ROOT,
    nonEmpty(env.SALES_PROCESSED_DIR) ?? path.join('data', 'processed')
  );
  return {
    baseUrl: nonEmpty(env.SALES_BASE_URL) ?? DEFAULT_BASE_URL,
    rawDir,
    processedDir,
    outputFile: path.resolve(processedDir, nonEmpty(env.SALES_OUTPUT_FILE) ?? DEFAULT_OUTPUT_FILE_NAME),
    downloadTimeoutMs: nonNegativeInt(env.SALES_DOWNLOAD_TIMEOUT_MS, DEFAULT_DOWNLOAD_TIMEOUT_MS),
    downloadDelayMs: nonNegativeInt(env.SALES_DOWNLOAD_DELAY_MS, DEFAULT_DOWNLOAD_DELAY_MS),
    headerKeyword: nonEmpty(env.SALES_HEADER_KEYWORD) ?? DEFAULT_HEADER_KEYWORD,
  };
}

export function getSettings(): SalesSettings {
  loadEnv();
  return resolveSettings(process.env);
}
