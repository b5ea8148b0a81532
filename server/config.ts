import 'dotenv/config';
import * as path from 'path';

// --- Storage ---
export const HOLDINGS_DATA_DIR = path.resolve(String(process.env.HOLDINGS_DATA_DIR || '.').trim() || '.');
/** Wide constituents table, resolved against HOLDINGS_DATA_DIR when relative. */
export const CONSTITUENTS_TABLE_FILE = path.resolve(
  HOLDINGS_DATA_DIR,
  String(process.env.CONSTITUENTS_TABLE_FILE || 'arkk_constituents.csv').trim() || 'arkk_constituents.csv',
);
export const HOLDINGS_SOURCES_FILE = String(process.env.HOLDINGS_SOURCES_FILE || '').trim();
export const DEFAULT_SOURCE_ID = String(process.env.HOLDINGS_DEFAULT_SOURCE || 'arkk').trim().toLowerCase();

// --- Fetch ---
export const HOLDINGS_FETCH_TIMEOUT_MS = Math.max(1_000, Number(process.env.HOLDINGS_FETCH_TIMEOUT_MS) || 30_000);
export const HOLDINGS_USER_AGENT = String(
  process.env.HOLDINGS_USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
);

// --- Reporting ---
export const HOLDINGS_TOP_N = Math.max(1, Math.floor(Number(process.env.HOLDINGS_TOP_N) || 10));

// --- Logging ---
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/** Level the logger starts with; an unknown LOG_LEVEL falls back to info and is reported by startup validation. */
export function resolveLogLevel(raw: string | undefined): LogLevelName {
  const level = String(raw || '').trim().toLowerCase();
  return isLogLevelName(level) ? level : 'info';
}

// --- Startup validation ---
export function validateStartupEnvironment() {
  const errors: string[] = [];
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === null || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };

  const level = String(process.env.LOG_LEVEL || '').trim().toLowerCase();
  if (level && !isLogLevelName(level)) {
    errors.push(`LOG_LEVEL must be a pino level (received: ${level})`);
  }
  if (!/^[a-z0-9_-]+$/.test(DEFAULT_SOURCE_ID)) {
    errors.push(`HOLDINGS_DEFAULT_SOURCE must be a source id (received: ${DEFAULT_SOURCE_ID})`);
  }

  ['HOLDINGS_FETCH_TIMEOUT_MS', 'HOLDINGS_TOP_N'].forEach(warnIfInvalidPositiveNumber);

  if (warnings.length > 0) {
    for (const warning of warnings) {
      console.warn(`[startup-env] ${warning}`);
    }
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
}
