/**
 * File operations for the wide constituents table.
 * Layout: `ticker` first, then one column per observation date, every cell numeric.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { parseCsv, parseCsvHeader, toCsv } from '../lib/csv.js';
import { isDateKey, parseIsoDate } from '../lib/dateUtils.js';
import { MissingTableError, ParseError, SchemaError } from '../lib/errors.js';
import { ABSENT_WEIGHT, TICKER_COLUMN, WeightLedger } from './weightLedger.js';

export interface LoadedTable {
  ledger: WeightLedger;
  /** Cells read as the sentinel because they were blank or NaN. */
  blankCells: number;
}

/** Blank cells and `NaN` are holes; they load as the sentinel. */
function isHole(cell: string): boolean {
  const value = cell.trim();
  return value === '' || /^nan$/i.test(value);
}

/** Date key of a `YYYYMMDD` header, or of the `YYYY-MM-DD` form older tables used; '' otherwise. */
function headerDateKey(header: string): string {
  return isDateKey(header) ? header : parseIsoDate(header);
}

/**
 * Check the header row as written: `ticker`, then distinct date columns.
 * Returns the date columns.
 */
function validateHeader(header: string[], label: string): string[] {
  if (header.length === 0 || header[0] !== TICKER_COLUMN) {
    throw new SchemaError(`${label}: first column must be "${TICKER_COLUMN}"`, [TICKER_COLUMN]);
  }
  const dateColumns = header.slice(1);
  const seen = new Set<string>();
  for (const column of dateColumns) {
    const dateKey = headerDateKey(column);
    if (!dateKey) {
      throw new SchemaError(`${label}: column "${column}" is not a YYYYMMDD date`);
    }
    if (seen.has(dateKey)) {
      throw new SchemaError(`${label}: duplicate column "${column}"`);
    }
    seen.add(dateKey);
  }
  return dateColumns;
}

/**
 * Build a ledger from table CSV text.
 * A row without a ticker cannot be keyed, so it fails the load rather than
 * being dropped on the next write.
 */
export function parseConstituentsTable(text: string, label = 'constituents table'): LoadedTable {
  const dateColumns = validateHeader(parseCsvHeader(text), label);
  const { rows } = parseCsv(text);
  const ledger = new WeightLedger();
  dateColumns.forEach((dateColumn) => ledger.addDateColumn(dateColumn));

  let blankCells = 0;
  rows.forEach((row, index) => {
    const ticker = row[TICKER_COLUMN].trim();
    if (!ticker) {
      throw new SchemaError(`${label}: row ${index + 1} has no ticker`, [TICKER_COLUMN]);
    }
    if (!ledger.addTicker(ticker)) {
      throw new SchemaError(`${label}: duplicate ticker ${ticker} at row ${index + 1}`);
    }
    for (const dateColumn of dateColumns) {
      const cell = row[dateColumn];
      if (isHole(cell)) {
        blankCells += 1;
        ledger.set(ticker, dateColumn, ABSENT_WEIGHT);
        continue;
      }
      const weight = Number(cell.trim());
      if (!Number.isFinite(weight)) {
        throw new ParseError(`${label}: non-numeric value "${cell}" for ${ticker} in ${dateColumn}`, index + 1);
      }
      ledger.set(ticker, dateColumn, weight);
    }
  });

  return { ledger, blankCells };
}

export async function readConstituentsTable(tablePath: string): Promise<LoadedTable> {
  let text: string;
  try {
    text = await fs.readFile(tablePath, 'utf8');
  } catch (err: unknown) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new MissingTableError(tablePath);
    }
    throw err;
  }
  return parseConstituentsTable(text, path.basename(tablePath));
}

export function serializeConstituentsTable(ledger: WeightLedger): string {
  const { columns, rows } = ledger.toWideTable();
  return toCsv(columns, rows);
}

/** Write through a temp file and rename so a crash never leaves a half-written table. */
export async function writeConstituentsTable(tablePath: string, ledger: WeightLedger): Promise<void> {
  const tempPath = path.join(path.dirname(tablePath), `.${path.basename(tablePath)}.${process.pid}.tmp`);
  await fs.writeFile(tempPath, serializeConstituentsTable(ledger), 'utf8');
  try {
    await fs.rename(tempPath, tablePath);
  } catch (err: unknown) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Create an empty table (header `ticker` only) when none exists.
 * Returns false, leaving the file alone, when a table is already there.
 */
export async function initConstituentsTable(tablePath: string): Promise<boolean> {
  await fs.mkdir(path.dirname(tablePath), { recursive: true });
  try {
    await fs.writeFile(tablePath, `${TICKER_COLUMN}\n`, { encoding: 'utf8', flag: 'wx' });
    return true;
  } catch (err: unknown) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'EEXIST') return false;
    throw err;
  }
}
