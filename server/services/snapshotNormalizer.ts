/**
 * Turns a source's raw rows into a HoldingsSnapshot through its declared field
 * mapping. Weight is required; the enrichment fields are optional and come
 * through as null when the column is missing or the cell is blank.
 */

import { HoldingRecordSchema, formatZodIssues, type HoldingsSource } from '../lib/apiSchemas.js';
import { ParseError, SchemaError } from '../lib/errors.js';
import { resolveFieldColumns } from '../data/holdingsSources.js';
import { parseWeight } from './mergeEngine.js';
import type { HoldingRecord, HoldingsSnapshot } from '../../shared/holdings-types.js';

/**
 * Parse a money, percent or count cell: `$1,234.50`, `-0.42%`, `12,000`.
 * Returns null for a blank cell and NaN for anything else unreadable.
 */
export function cleanNumber(raw: unknown): number | null {
  const text = String(raw ?? '').trim();
  if (!text || text === '-' || /^n\/?a$/i.test(text)) return null;
  const negative = /^\(.*\)$/.test(text);
  const value = parseWeight(negative ? text.slice(1, -1) : text.replace(/^(-?)\$/, '$1'));
  return negative ? -value : value;
}

function optionalText(value: string | undefined): string | null {
  const text = String(value ?? '').trim();
  return text.length > 0 ? text : null;
}

export interface NormalizeInput {
  source: Pick<HoldingsSource, 'id' | 'fund' | 'fields'>;
  columns: string[];
  rows: Array<Record<string, string>>;
  observationDate: string;
  dateOrigin: HoldingsSnapshot['dateOrigin'];
  fetchedAt: string;
}

export interface NormalizeResult {
  snapshot: HoldingsSnapshot;
  /** Optional cells that could not be read as numbers and were set to null. */
  unreadableCells: number;
}

export function normalizeHoldings(input: NormalizeInput): NormalizeResult {
  const { source } = input;
  const resolved = resolveFieldColumns(input.columns, source.fields);
  const tickerColumn = resolved.ticker;
  const weightColumn = resolved.weight;
  if (!tickerColumn || !weightColumn) {
    const missing = [tickerColumn ? null : 'ticker', weightColumn ? null : 'weight'].filter(
      (field): field is string => field !== null,
    );
    throw new SchemaError(`${source.id}: missing required column(s) ${missing.join(', ')}`, missing);
  }

  let unreadableCells = 0;
  const optionalNumber = (row: Record<string, string>, column: string | undefined): number | null => {
    if (!column) return null;
    const value = cleanNumber(row[column]);
    if (value !== null && !Number.isFinite(value)) {
      unreadableCells += 1;
      return null;
    }
    return value;
  };

  const byTicker = new Map<string, HoldingRecord>();
  input.rows.forEach((row, index) => {
    const ticker = String(row[tickerColumn] ?? '').trim();
    if (!ticker) return;
    const weightPercent = parseWeight(row[weightColumn]);
    if (!Number.isFinite(weightPercent)) {
      throw new ParseError(`${source.id}: weight "${row[weightColumn] ?? ''}" for ${ticker} is not numeric`, index + 1);
    }
    const candidate = {
      ticker,
      weightPercent,
      name: resolved.name ? optionalText(row[resolved.name]) : null,
      cusip: resolved.cusip ? optionalText(row[resolved.cusip]) : null,
      sector: resolved.sector ? optionalText(row[resolved.sector]) : null,
      shares: optionalNumber(row, resolved.shares),
      marketValue: optionalNumber(row, resolved.marketValue),
      price: optionalNumber(row, resolved.price),
      priceChangePercent: optionalNumber(row, resolved.priceChange),
    };
    const parsed = HoldingRecordSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new ParseError(`${source.id}: invalid holding ${ticker}: ${formatZodIssues(parsed.error)}`, index + 1);
    }
    byTicker.set(ticker, parsed.data);
  });

  if (byTicker.size === 0) {
    throw new SchemaError(`${source.id}: no holdings rows`);
  }

  return {
    snapshot: {
      sourceId: source.id,
      fund: source.fund,
      observationDate: input.observationDate,
      dateOrigin: input.dateOrigin,
      fetchedAt: input.fetchedAt,
      holdings: Array.from(byTicker.values()),
    },
    unreadableCells,
  };
}
