/**
 * Dated snapshot files on disk: discovery for the merge and export for the fetch.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { parseCsv, toCsv, type CsvTable } from '../lib/csv.js';
import { formatDateKeyLong, formatDateKeyUs } from '../lib/dateUtils.js';
import type { CanonicalField, HoldingsSource } from '../lib/apiSchemas.js';
import { CANONICAL_FIELDS, CANONICAL_HEADERS, snapshotFileName } from './holdingsSources.js';
import type { HoldingRecord, HoldingsSnapshot } from '../../shared/holdings-types.js';

/**
 * Files named `<prefix>_holdings_*.csv` in `directory`, sorted by name.
 * Whether the name carries a valid date is the date extractor's concern.
 */
export async function listSnapshotFiles(directory: string, source: Pick<HoldingsSource, 'filePrefix'>): Promise<string[]> {
  const prefix = `${source.filePrefix}_holdings_`;
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.startsWith(prefix) && entry.name.endsWith('.csv'))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(directory, name));
}

export async function readSnapshotFile(filePath: string): Promise<CsvTable> {
  return parseCsv(await fs.readFile(filePath, 'utf8'));
}

function holdingCells(record: HoldingRecord, usDate: string): Record<string, string | number | null> {
  const values: Record<CanonicalField, string | number | null> = {
    date: usDate,
    ticker: record.ticker,
    name: record.name,
    cusip: record.cusip,
    sector: record.sector,
    shares: record.shares,
    marketValue: record.marketValue,
    price: record.price,
    priceChange: record.priceChangePercent,
    weight: record.weightPercent,
  };
  const cells: Record<string, string | number | null> = {};
  for (const field of CANONICAL_FIELDS) {
    cells[CANONICAL_HEADERS[field]] = values[field];
  }
  return cells;
}

/** Snapshot as CSV with canonical headers; the date column is MM/DD/YYYY. */
export function serializeSnapshotCsv(snapshot: HoldingsSnapshot): string {
  const usDate = formatDateKeyUs(snapshot.observationDate);
  const columns = CANONICAL_FIELDS.map((field) => CANONICAL_HEADERS[field]);
  return toCsv(
    columns,
    snapshot.holdings.map((record) => holdingCells(record, usDate)),
  );
}

export function serializeSnapshotJson(snapshot: HoldingsSnapshot): string {
  const holdingsDate = formatDateKeyLong(snapshot.observationDate);
  const records = snapshot.holdings.map((record) => ({
    fund: snapshot.fund,
    date: formatDateKeyUs(snapshot.observationDate),
    ...record,
    holdingsDate,
    fetchedAt: snapshot.fetchedAt,
  }));
  return `${JSON.stringify(records, null, 2)}\n`;
}

export async function writeSnapshotFiles(
  directory: string,
  source: Pick<HoldingsSource, 'filePrefix'>,
  snapshot: HoldingsSnapshot,
  formats: Array<'csv' | 'json'> = ['csv', 'json'],
): Promise<string[]> {
  await fs.mkdir(directory, { recursive: true });
  const written: string[] = [];
  for (const format of formats) {
    const filePath = path.join(directory, snapshotFileName(source, snapshot.observationDate, format));
    const body = format === 'csv' ? serializeSnapshotCsv(snapshot) : serializeSnapshotJson(snapshot);
    await fs.writeFile(filePath, body, 'utf8');
    written.push(filePath);
  }
  return written;
}
