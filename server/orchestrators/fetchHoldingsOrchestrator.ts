import { promises as fs } from 'fs';
import * as path from 'path';
import type { HoldingsSource } from '../lib/apiSchemas.js';
import { currentEtDateKey } from '../lib/dateUtils.js';
import { FetchError, describeError } from '../lib/errors.js';
import { resolveFieldColumns, snapshotFilePattern } from '../data/holdingsSources.js';
import { readSnapshotFile, writeSnapshotFiles } from '../data/snapshotStore.js';
import { dateFromContent, resolveSnapshotDate } from '../services/dateExtractor.js';
import { fetchRawHoldings, loadDemoHoldings, type FetchImpl, type RawHoldings } from '../services/holdingsFetcher.js';
import { formatHoldingsReport } from '../services/holdingsReport.js';
import { normalizeHoldings } from '../services/snapshotNormalizer.js';
import type { HoldingsSnapshot } from '../../shared/holdings-types.js';

interface FetchHoldingsOptions {
  source: HoldingsSource;
  outputDir: string;
  /** Skip the network and use the source's demo fixture. */
  demo?: boolean;
  /** Use the demo fixture when the live fetch fails. */
  fallbackToDemo?: boolean;
  formats?: Array<'csv' | 'json'>;
  topN?: number;
  timeoutMs?: number;
  fetchImpl?: FetchImpl;
  now?: Date;
}

export interface FetchHoldingsResult {
  snapshot: HoldingsSnapshot;
  files: string[];
  report: string[];
}

/**
 * The date a fetch is filed under: a date column in the rows, then a date the
 * page states, then today's date in New York.
 */
export function resolveFetchedDate(
  raw: RawHoldings,
  source: Pick<HoldingsSource, 'fields' | 'fund'>,
  now: Date = new Date(),
): { date: string; origin: HoldingsSnapshot['dateOrigin'] } {
  const dateColumn = resolveFieldColumns(raw.columns, source.fields).date;
  if (dateColumn && raw.rows.length > 0 && String(raw.rows[0][dateColumn] ?? '').trim()) {
    return { date: dateFromContent(raw.rows, dateColumn, source.fund), origin: 'content' };
  }
  if (raw.pageDate) {
    return { date: raw.pageDate, origin: 'page' };
  }
  return { date: currentEtDateKey(now), origin: 'fetch-date' };
}

async function acquireRawHoldings(options: FetchHoldingsOptions): Promise<RawHoldings> {
  const { source } = options;
  if (options.demo) {
    return loadDemoHoldings(source);
  }
  try {
    return await fetchRawHoldings(source, { timeoutMs: options.timeoutMs, fetchImpl: options.fetchImpl });
  } catch (err: unknown) {
    if (!(err instanceof FetchError) || !options.fallbackToDemo || !source.demoFile) throw err;
    console.warn(`[fetch] ${source.fund}: live fetch failed (${describeError(err)}); using demo data instead`);
    return loadDemoHoldings(source);
  }
}

export async function runFetchHoldings(options: FetchHoldingsOptions): Promise<FetchHoldingsResult> {
  const { source } = options;
  const now = options.now ?? new Date();
  const raw = await acquireRawHoldings(options);
  const { date, origin } = resolveFetchedDate(raw, source, now);

  const { snapshot, unreadableCells } = normalizeHoldings({
    source,
    columns: raw.columns,
    rows: raw.rows,
    observationDate: date,
    dateOrigin: origin,
    fetchedAt: now.toISOString(),
  });
  if (unreadableCells > 0) {
    console.warn(`[fetch] ${source.fund}: ${unreadableCells} optional numeric cell(s) unreadable, stored as empty`);
  }
  console.log(`[fetch] ${source.fund}: ${snapshot.holdings.length} holdings as of ${date} (date from ${origin})`);

  const report = formatHoldingsReport(snapshot, options.topN);
  report.forEach((line) => console.log(line));

  const files = await writeSnapshotFiles(options.outputDir, source, snapshot, options.formats);
  files.forEach((file) => console.log(`[fetch] Data saved to: ${file}`));
  return { snapshot, files, report };
}

/** Load a snapshot file written earlier (or a raw source CSV) for reporting. */
export async function loadSnapshotFile(source: HoldingsSource, filePath: string): Promise<HoldingsSnapshot> {
  const table = await readSnapshotFile(filePath);
  const resolved = resolveSnapshotDate({
    filePath,
    rows: table.rows,
    dateColumn: resolveFieldColumns(table.columns, source.fields).date,
    filenamePattern: snapshotFilePattern(source),
  });
  const stat = await fs.stat(filePath);
  const { snapshot } = normalizeHoldings({
    source,
    columns: table.columns,
    rows: table.rows,
    observationDate: resolved.date,
    dateOrigin: resolved.origin,
    fetchedAt: stat.mtime.toISOString(),
  });
  console.log(`[report] Loaded ${path.basename(filePath)}: ${snapshot.holdings.length} holdings`);
  return snapshot;
}
