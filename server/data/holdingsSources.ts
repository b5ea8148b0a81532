/**
 * Registry of holdings sources and their declared field mappings.
 * Loaded from config/sources.json (or HOLDINGS_SOURCES_FILE) and validated
 * once at load time; a bad mapping fails the command before any file is read.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  HoldingsSourcesConfigSchema,
  formatZodIssues,
  type CanonicalField,
  type FieldMapping,
  type HoldingsSource,
} from '../lib/apiSchemas.js';
import { SourceConfigError, describeError } from '../lib/errors.js';
import { HOLDINGS_SOURCES_FILE } from '../config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** The config folder sits at the project root, two levels above this file. */
export const CONFIG_DIR = path.resolve(__dirname, '..', '..', 'config');
export const DEFAULT_SOURCES_FILE = path.join(CONFIG_DIR, 'sources.json');

export const CANONICAL_FIELDS: CanonicalField[] = [
  'date',
  'ticker',
  'name',
  'cusip',
  'sector',
  'shares',
  'marketValue',
  'price',
  'priceChange',
  'weight',
];

/**
 * Header each canonical field is written under in snapshot files this tool
 * produces. Always accepted when reading, after a source's own aliases.
 */
export const CANONICAL_HEADERS: Record<CanonicalField, string> = {
  date: 'date',
  ticker: 'ticker',
  name: 'name',
  cusip: 'cusip',
  sector: 'sector',
  shares: 'shares',
  marketValue: 'market value ($)',
  price: 'price ($)',
  priceChange: 'price change (%)',
  weight: 'weight (%)',
};

export function normalizeHeader(header: string): string {
  return String(header || '')
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ');
}

function assertNoAliasCollisions(source: HoldingsSource): void {
  const owner = new Map<string, CanonicalField>();
  for (const field of CANONICAL_FIELDS) {
    for (const alias of source.fields[field] ?? []) {
      const key = normalizeHeader(alias);
      const previous = owner.get(key);
      if (previous && previous !== field) {
        throw new SourceConfigError(
          `Source ${source.id}: header "${alias}" is mapped to both ${previous} and ${field}`,
        );
      }
      owner.set(key, field);
    }
  }
}

/** Validate an already-parsed config object. */
export function parseHoldingsSources(payload: unknown, label = 'sources config'): HoldingsSource[] {
  const result = HoldingsSourcesConfigSchema.safeParse(payload);
  if (!result.success) {
    throw new SourceConfigError(`Invalid ${label}: ${formatZodIssues(result.error)}`);
  }
  result.data.sources.forEach(assertNoAliasCollisions);
  return result.data.sources;
}

export async function loadHoldingsSources(filePath: string = HOLDINGS_SOURCES_FILE || DEFAULT_SOURCES_FILE): Promise<HoldingsSource[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err: unknown) {
    throw new SourceConfigError(`Cannot read sources config ${filePath}: ${describeError(err)}`, { cause: err });
  }
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err: unknown) {
    throw new SourceConfigError(`Sources config ${filePath} is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  return parseHoldingsSources(payload, path.basename(filePath));
}

export function getHoldingsSource(sources: HoldingsSource[], id: string): HoldingsSource {
  const wanted = String(id || '').trim().toLowerCase();
  const source = sources.find((candidate) => candidate.id === wanted);
  if (!source) {
    const known = sources.map((candidate) => candidate.id).join(', ');
    throw new SourceConfigError(`Unknown source "${id}" (configured: ${known})`);
  }
  return source;
}

/**
 * Map each canonical field to the header that carries it in `columns`.
 * Declared aliases win over the canonical header; fields with no matching
 * header are left out.
 */
export function resolveFieldColumns(columns: string[], mapping: FieldMapping): Partial<Record<CanonicalField, string>> {
  const byNormalized = new Map<string, string>();
  for (const column of columns) {
    const key = normalizeHeader(column);
    if (!byNormalized.has(key)) byNormalized.set(key, column);
  }
  const resolved: Partial<Record<CanonicalField, string>> = {};
  for (const field of CANONICAL_FIELDS) {
    const candidates = [...(mapping[field] ?? []), CANONICAL_HEADERS[field]];
    for (const candidate of candidates) {
      const column = byNormalized.get(normalizeHeader(candidate));
      if (column !== undefined) {
        resolved[field] = column;
        break;
      }
    }
  }
  return resolved;
}

// ---------------------------------------------------------------------------
// Snapshot file naming
// ---------------------------------------------------------------------------

export function snapshotFileName(source: Pick<HoldingsSource, 'filePrefix'>, dateKey: string, extension: 'csv' | 'json' = 'csv'): string {
  return `${source.filePrefix}_holdings_${dateKey}.${extension}`;
}

/** Matches `<prefix>_holdings_<8 digits>.csv`; group 1 is the date key. */
export function snapshotFilePattern(source: Pick<HoldingsSource, 'filePrefix'>): RegExp {
  const prefix = source.filePrefix.replace(/[-]/g, '\\-');
  return new RegExp(`^${prefix}_holdings_(\\d{8})\\.csv$`);
}

export function snapshotGlob(source: Pick<HoldingsSource, 'filePrefix'>): string {
  return `${source.filePrefix}_holdings_*.csv`;
}
