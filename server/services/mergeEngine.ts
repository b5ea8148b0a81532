/**
 * Constituents merge engine: folds one dated snapshot into the weight ledger.
 *
 * A merge either applies completely or not at all. Every check (duplicate
 * date, required columns, numeric weights) runs before the ledger is touched,
 * so a rejected snapshot leaves the table exactly as it was.
 */

import type { FieldMapping } from '../lib/apiSchemas.js';
import type { CsvTable } from '../lib/csv.js';
import { formatDateKeyIso, isDateKey } from '../lib/dateUtils.js';
import { DuplicateDateError, ParseError, SchemaError } from '../lib/errors.js';
import { resolveFieldColumns } from '../data/holdingsSources.js';
import { ABSENT_WEIGHT, type WeightLedger } from '../data/weightLedger.js';
import type { MergeStats, SnapshotWeights } from '../../shared/holdings-types.js';

export const MAX_WEIGHT_PERCENT = 100;

/**
 * Parse a weight cell: surrounding whitespace, a trailing `%`, a leading `$`
 * and thousands separators are dropped. Returns NaN when what is left is not
 * a plain decimal number.
 */
export function parseWeight(raw: unknown): number {
  const text = String(raw ?? '')
    .trim()
    .replace(/%$/, '')
    .replace(/^\$/, '')
    .replace(/,/g, '')
    .trim();
  if (!/^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/.test(text)) return NaN;
  return Number(text);
}

/**
 * The table column that already holds `dateKey`, if any. Columns written as
 * `YYYY-MM-DD` by older tables count as the same date.
 */
export function findDateColumn(ledger: WeightLedger, dateKey: string): string | null {
  if (ledger.hasDateColumn(dateKey)) return dateKey;
  const iso = formatDateKeyIso(dateKey);
  if (iso && ledger.hasDateColumn(iso)) return iso;
  return null;
}

export interface SnapshotColumns {
  tickerColumn: string;
  weightColumn: string;
  dateColumn: string | undefined;
}

/** Locate the ticker, weight and date headers through the source's mapping. */
export function resolveSnapshotColumns(columns: string[], fields: FieldMapping, label = 'snapshot'): SnapshotColumns {
  const resolved = resolveFieldColumns(columns, fields);
  const missing: string[] = [];
  if (!resolved.ticker) missing.push('ticker');
  if (!resolved.weight) missing.push('weight');
  if (!resolved.ticker || !resolved.weight) {
    throw new SchemaError(`${label}: missing required column(s) ${missing.join(', ')}`, missing);
  }
  return { tickerColumn: resolved.ticker, weightColumn: resolved.weight, dateColumn: resolved.date };
}

/**
 * Extract ticker/weight pairs from parsed snapshot rows.
 * Rows with an empty ticker (cash lines, footnotes) are ignored. When a
 * ticker repeats, the later row wins.
 */
export function readSnapshotWeights(
  table: CsvTable,
  columns: SnapshotColumns,
  observationDate: string,
  label = 'snapshot',
): SnapshotWeights {
  const latest = new Map<string, number>();
  table.rows.forEach((row, index) => {
    const ticker = String(row[columns.tickerColumn] ?? '').trim();
    if (!ticker) return;
    const raw = row[columns.weightColumn];
    const weight = parseWeight(raw);
    if (!Number.isFinite(weight)) {
      throw new ParseError(`${label}: weight "${String(raw ?? '')}" for ${ticker} is not numeric`, index + 1);
    }
    latest.set(ticker, weight);
  });
  return {
    observationDate,
    weights: Array.from(latest, ([ticker, weightPercent]) => ({ ticker, weightPercent })),
  };
}

function validateSnapshot(snapshot: SnapshotWeights): Map<string, number> {
  if (!isDateKey(snapshot.observationDate)) {
    throw new ParseError(`Observation date "${snapshot.observationDate}" is not a YYYYMMDD date`);
  }
  if (snapshot.weights.length === 0) {
    throw new SchemaError(`Snapshot ${snapshot.observationDate} has no holdings rows`);
  }
  const latest = new Map<string, number>();
  for (const { ticker, weightPercent } of snapshot.weights) {
    const key = String(ticker ?? '').trim();
    if (!key) {
      throw new SchemaError(`Snapshot ${snapshot.observationDate} has a holding without a ticker`, ['ticker']);
    }
    if (!Number.isFinite(weightPercent) || weightPercent < 0 || weightPercent > MAX_WEIGHT_PERCENT) {
      throw new ParseError(
        `Snapshot ${snapshot.observationDate}: weight ${weightPercent} for ${key} is outside 0-${MAX_WEIGHT_PERCENT}`,
      );
    }
    latest.set(key, weightPercent);
  }
  return latest;
}

/**
 * Fold a snapshot into the ledger as a new date column.
 *
 * Throws DuplicateDateError (soft, nothing changed) when the date is already
 * a column, and SchemaError/ParseError when the snapshot is malformed.
 * New tickers are appended as rows and read 0 in every earlier column; rows
 * the snapshot does not report read 0 in the new column.
 */
export function mergeSnapshot(ledger: WeightLedger, snapshot: SnapshotWeights): MergeStats {
  const existing = findDateColumn(ledger, snapshot.observationDate);
  if (existing !== null) {
    throw new DuplicateDateError(existing);
  }
  const latest = validateSnapshot(snapshot);

  const dateColumn = snapshot.observationDate;
  const priorTickers = [...ledger.tickers];
  const newTickers: string[] = [];
  for (const ticker of latest.keys()) {
    if (ledger.addTicker(ticker)) newTickers.push(ticker);
  }
  ledger.addDateColumn(dateColumn);
  for (const [ticker, weight] of latest) {
    ledger.set(ticker, dateColumn, weight);
  }

  const values = ledger.column(dateColumn);
  return {
    matched: values.filter((weight) => weight !== ABSENT_WEIGHT).length,
    total: values.length,
    newTickers,
    droppedTickers: priorTickers.filter((ticker) => !latest.has(ticker)),
  };
}

export function formatMatchRate(stats: Pick<MergeStats, 'matched' | 'total'>): string {
  const pct = stats.total > 0 ? (stats.matched / stats.total) * 100 : 0;
  return `Matched ${stats.matched}/${stats.total} tickers (${pct.toFixed(1)}%)`;
}
