import * as path from 'path';
import type { HoldingsSource } from '../lib/apiSchemas.js';
import { DuplicateDateError, NoSnapshotsError, describeError, isHoldingsError } from '../lib/errors.js';
import { readConstituentsTable, writeConstituentsTable } from '../data/constituentsTable.js';
import { snapshotFilePattern, snapshotGlob } from '../data/holdingsSources.js';
import { TICKER_COLUMN } from '../data/weightLedger.js';
import { listSnapshotFiles, readSnapshotFile } from '../data/snapshotStore.js';
import type { CsvTable } from '../lib/csv.js';
import { resolveSnapshotDate, type DateOrigin } from '../services/dateExtractor.js';
import {
  findDateColumn,
  formatMatchRate,
  mergeSnapshot,
  readSnapshotWeights,
  resolveSnapshotColumns,
  type SnapshotColumns,
} from '../services/mergeEngine.js';
import type { MergeBatchResult, MergeFileOutcome } from '../../shared/holdings-types.js';

export interface MergeBatchOptions {
  source: HoldingsSource;
  tablePath: string;
  snapshotDir: string;
  /** Compute the merge without writing the table. */
  dryRun?: boolean;
}

interface PendingSnapshot {
  file: string;
  table: CsvTable;
  columns: SnapshotColumns;
  date: string;
  origin: DateOrigin;
}

function skippedOutcome(file: string, err: unknown, date: string | null = null, origin: DateOrigin | null = null): MergeFileOutcome {
  return {
    file,
    status: 'skipped',
    dateColumn: date,
    dateOrigin: origin,
    stats: null,
    errorCode: isHoldingsError(err) ? err.code : 'IO',
    message: describeError(err),
  };
}

/**
 * Read one file and resolve its observation date. Errors are returned as a
 * skipped outcome so one bad file never stops the batch.
 */
async function prepareSnapshot(file: string, source: HoldingsSource): Promise<PendingSnapshot | MergeFileOutcome> {
  const name = path.basename(file);
  try {
    const table = await readSnapshotFile(file);
    const columns = resolveSnapshotColumns(table.columns, source.fields, name);
    const resolved = resolveSnapshotDate({
      filePath: file,
      rows: table.rows,
      dateColumn: columns.dateColumn,
      filenamePattern: snapshotFilePattern(source),
    });
    if (resolved.conflictingFilenameDate) {
      console.warn(
        `[merge] ${name}: content date ${resolved.date} differs from file name date ${resolved.conflictingFilenameDate}; using content date`,
      );
    }
    return { file: name, table, columns, date: resolved.date, origin: resolved.origin };
  } catch (err: unknown) {
    console.warn(`[merge] Skipping ${name}: ${describeError(err)}`);
    return skippedOutcome(name, err);
  }
}

function isPending(value: PendingSnapshot | MergeFileOutcome): value is PendingSnapshot {
  return 'table' in value;
}

/**
 * Fold every pending snapshot file into the constituents table.
 *
 * The table is read once and written once, and only when at least one
 * snapshot merged. Files are applied in date order (name order breaks ties);
 * each file is its own unit of work, so a failure never undoes earlier merges.
 */
export async function runMergeBatch(options: MergeBatchOptions): Promise<MergeBatchResult> {
  const { source, tablePath, snapshotDir } = options;
  const loaded = await readConstituentsTable(tablePath);
  const ledger = loaded.ledger;
  console.log(
    `[merge] Loaded ${path.basename(tablePath)}: ${ledger.rowCount} tickers x ${ledger.dateColumns.length} date columns`,
  );
  if (loaded.blankCells > 0) {
    console.warn(`[merge] ${loaded.blankCells} blank cell(s) in ${path.basename(tablePath)} read as 0`);
  }

  const files = await listSnapshotFiles(snapshotDir, source);
  if (files.length === 0) {
    throw new NoSnapshotsError(snapshotDir, snapshotGlob(source));
  }
  console.log(`[merge] Found ${files.length} snapshot file(s)`);

  const outcomes: MergeFileOutcome[] = [];
  const pending: PendingSnapshot[] = [];
  for (const file of files) {
    const prepared = await prepareSnapshot(file, source);
    if (isPending(prepared)) {
      pending.push(prepared);
    } else {
      outcomes.push(prepared);
    }
  }
  pending.sort((a, b) => (a.date === b.date ? a.file.localeCompare(b.file) : a.date.localeCompare(b.date)));

  let changed = false;
  for (const snapshot of pending) {
    const lastColumn = ledger.dateColumns[ledger.dateColumns.length - 1];
    try {
      const existing = findDateColumn(ledger, snapshot.date);
      if (existing !== null) throw new DuplicateDateError(existing);
      const weights = readSnapshotWeights(snapshot.table, snapshot.columns, snapshot.date, snapshot.file);
      const stats = mergeSnapshot(ledger, weights);
      changed = true;
      console.log(`[merge] Processed ${snapshot.file} -> column ${snapshot.date} (date from ${snapshot.origin})`);
      if (stats.newTickers.length > 0) {
        console.log(`[merge]   ${stats.newTickers.length} new ticker(s): ${[...stats.newTickers].sort().join(', ')}`);
      }
      if (lastColumn !== undefined && /^\d{8}$/.test(lastColumn) && snapshot.date < lastColumn) {
        console.warn(`[merge]   column ${snapshot.date} appended after later column ${lastColumn}`);
      }
      console.log(`[merge]   ${formatMatchRate(stats)}`);
      outcomes.push({
        file: snapshot.file,
        status: 'merged',
        dateColumn: snapshot.date,
        dateOrigin: snapshot.origin,
        stats,
        errorCode: null,
        message: null,
      });
    } catch (err: unknown) {
      if (err instanceof DuplicateDateError) {
        console.log(`[merge] Date column ${err.date} already exists, skipping ${snapshot.file}`);
        outcomes.push({
          file: snapshot.file,
          status: 'duplicate',
          dateColumn: err.date,
          dateOrigin: snapshot.origin,
          stats: null,
          errorCode: err.code,
          message: err.message,
        });
        continue;
      }
      if (!isHoldingsError(err)) throw err;
      console.warn(`[merge] Skipping ${snapshot.file}: ${err.message}`);
      outcomes.push(skippedOutcome(snapshot.file, err, snapshot.date, snapshot.origin));
    }
  }

  const written = changed && !options.dryRun;
  if (written) {
    await writeConstituentsTable(tablePath, ledger);
    console.log(
      `[merge] Updated ${path.basename(tablePath)}: ${ledger.rowCount} tickers x ${ledger.dateColumns.length} date columns`,
    );
  } else if (changed) {
    console.log(`[merge] Dry run: ${path.basename(tablePath)} left unchanged`);
  } else {
    console.log('[merge] No changes made - all snapshots already merged or skipped');
  }

  const order = new Map(files.map((file, index) => [path.basename(file), index]));
  outcomes.sort((a, b) => (order.get(a.file) ?? 0) - (order.get(b.file) ?? 0));

  return {
    tablePath,
    changed,
    written,
    rowCount: ledger.rowCount,
    columns: [TICKER_COLUMN, ...ledger.dateColumns],
    files: outcomes,
  };
}
