/**
 * Observation-date resolution for snapshot files.
 *
 * The date a snapshot's own rows declare is authoritative. The date encoded in
 * the file name is used only when the rows carry no date at all.
 */

import * as path from 'path';
import { normalizeDateKey, parseCompactDate, parseLongDate } from '../lib/dateUtils.js';
import { DateFormatError } from '../lib/errors.js';

export type DateOrigin = 'content' | 'filename';

export interface ResolvedSnapshotDate {
  date: string;
  origin: DateOrigin;
  /** Date parsed from the file name when it disagrees with the content date. */
  conflictingFilenameDate: string | null;
}

/**
 * Read `YYYYMMDD` from a file name. `pattern` must capture the 8-digit date in
 * group 1, e.g. /^arkk_holdings_(\d{8})\.csv$/.
 */
export function dateFromFilename(filePath: string, pattern: RegExp): string {
  const base = path.basename(filePath);
  const match = base.match(pattern);
  if (!match || match[1] === undefined) {
    throw new DateFormatError(`File name ${base} does not match ${pattern.source}`);
  }
  const date = parseCompactDate(match[1]);
  if (!date) {
    throw new DateFormatError(`File name ${base} carries an impossible date ${match[1]}`);
  }
  return date;
}

/**
 * Read the date declared in the first data row. Accepts MM/DD/YYYY,
 * YYYY-MM-DD, YYYYMMDD and "Month D, YYYY".
 */
export function dateFromContent(rows: Array<Record<string, string>>, dateColumn: string | undefined, label = 'snapshot'): string {
  if (!dateColumn) {
    throw new DateFormatError(`${label}: no date column`);
  }
  if (rows.length === 0) {
    throw new DateFormatError(`${label}: no data rows to read a date from`);
  }
  const raw = String(rows[0][dateColumn] ?? '').trim();
  if (!raw) {
    throw new DateFormatError(`${label}: first row has an empty ${dateColumn}`);
  }
  const date = normalizeDateKey(raw);
  if (!date) {
    throw new DateFormatError(`${label}: cannot parse ${dateColumn} "${raw}"`);
  }
  return date;
}

function firstRowHasDate(rows: Array<Record<string, string>>, dateColumn: string | undefined): boolean {
  if (!dateColumn || rows.length === 0) return false;
  return String(rows[0][dateColumn] ?? '').trim().length > 0;
}

/**
 * Content first; file name only when the first row declares no date.
 * A present but unparsable content date fails rather than falling back.
 */
export function resolveSnapshotDate(input: {
  filePath: string;
  rows: Array<Record<string, string>>;
  dateColumn: string | undefined;
  filenamePattern: RegExp;
}): ResolvedSnapshotDate {
  const label = path.basename(input.filePath);
  if (!firstRowHasDate(input.rows, input.dateColumn)) {
    return {
      date: dateFromFilename(input.filePath, input.filenamePattern),
      origin: 'filename',
      conflictingFilenameDate: null,
    };
  }

  const date = dateFromContent(input.rows, input.dateColumn, label);
  let conflictingFilenameDate: string | null = null;
  const nameMatch = label.match(input.filenamePattern);
  if (nameMatch && nameMatch[1] !== undefined) {
    const nameDate = parseCompactDate(nameMatch[1]);
    if (nameDate && nameDate !== date) conflictingFilenameDate = nameDate;
  }
  return { date, origin: 'content', conflictingFilenameDate };
}

/** "Holdings as of August 20, 2025" anywhere in `text` → `20250820`, or '' when absent. */
export function parseHoldingsAsOf(text: string): string {
  const match = String(text || '').match(/Holdings as of\s+([A-Za-z]+\.?\s+\d{1,2},\s*\d{4})/i);
  if (!match) return '';
  return parseLongDate(match[1].replace(/\s+/g, ' '));
}
