/**
 * Error taxonomy for the holdings pipeline.
 *
 * Run-level errors (missing table, no snapshots, bad source config) stop the
 * whole command. Per-file errors (date, schema, parse) are caught by the batch
 * driver, logged, and recorded against the file that raised them.
 */

export type HoldingsErrorCode =
  | 'MISSING_TABLE'
  | 'NO_SNAPSHOTS'
  | 'DATE_FORMAT'
  | 'SCHEMA'
  | 'PARSE'
  | 'DUPLICATE_DATE'
  | 'SOURCE_CONFIG'
  | 'FETCH';

export class HoldingsError extends Error {
  readonly code: HoldingsErrorCode;

  constructor(code: HoldingsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingTableError extends HoldingsError {
  readonly tablePath: string;

  constructor(tablePath: string) {
    super('MISSING_TABLE', `Constituents table not found: ${tablePath}`);
    this.tablePath = tablePath;
  }
}

export class NoSnapshotsError extends HoldingsError {
  constructor(directory: string, pattern: string) {
    super('NO_SNAPSHOTS', `No snapshot files matching ${pattern} in ${directory}`);
  }
}

export class DateFormatError extends HoldingsError {
  constructor(message: string) {
    super('DATE_FORMAT', message);
  }
}

export class SchemaError extends HoldingsError {
  readonly missingFields: string[];

  constructor(message: string, missingFields: string[] = []) {
    super('SCHEMA', message);
    this.missingFields = missingFields;
  }
}

export class ParseError extends HoldingsError {
  /** 1-based data row (header excluded), when the failure is tied to a row. */
  readonly row: number | null;

  constructor(message: string, row: number | null = null) {
    super('PARSE', message);
    this.row = row;
  }
}

/** Soft error: the date column is already present, so the merge is a no-op. */
export class DuplicateDateError extends HoldingsError {
  readonly date: string;

  constructor(date: string) {
    super('DUPLICATE_DATE', `Date column ${date} already exists`);
    this.date = date;
  }
}

export class SourceConfigError extends HoldingsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SOURCE_CONFIG', message, options);
  }
}

export class FetchError extends HoldingsError {
  readonly httpStatus: number | null;

  constructor(message: string, httpStatus: number | null = null, options?: { cause?: unknown }) {
    super('FETCH', message, options);
    this.httpStatus = httpStatus;
  }
}

export function isHoldingsError(err: unknown, code?: HoldingsErrorCode): err is HoldingsError {
  if (!(err instanceof HoldingsError)) return false;
  return code === undefined || err.code === code;
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError or
 * TimeoutError by name, or an error message containing "aborted"
 * (case-insensitive).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const name = 'name' in err ? String(err.name || '') : '';
  const message = 'message' in err ? String(err.message || '') : '';
  return name === 'AbortError' || name === 'TimeoutError' || /aborted|aborterror/i.test(message);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
