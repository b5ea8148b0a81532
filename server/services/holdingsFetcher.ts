/**
 * Holdings HTTP client: downloads a source's CSV or HTML page with a bounded
 * timeout and hands back raw rows plus any date the page declares.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { HOLDINGS_FETCH_TIMEOUT_MS, HOLDINGS_USER_AGENT } from '../config.js';
import { DemoHoldingsSchema, formatZodIssues, type HoldingsSource } from '../lib/apiSchemas.js';
import { parseCsv } from '../lib/csv.js';
import { FetchError, SourceConfigError, describeError, isAbortError } from '../lib/errors.js';
import { CONFIG_DIR } from '../data/holdingsSources.js';
import { parseHoldingsAsOf } from './dateExtractor.js';
import { extractHoldingsTable, pageText, rowsToRecords } from './htmlTable.js';

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchOptions {
  timeoutMs?: number;
  signal?: AbortSignal | null;
  fetchImpl?: FetchImpl;
}

export interface RawHoldings {
  columns: string[];
  rows: Array<Record<string, string>>;
  /** `YYYYMMDD` the page itself declares ("Holdings as of ..."), or ''. */
  pageDate: string;
}

const ACCEPT_BY_KIND: Record<HoldingsSource['kind'], string> = {
  csv: 'text/csv,text/plain;q=0.9,*/*;q=0.8',
  html: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
};

export async function fetchSourceText(
  url: string,
  label: string,
  accept: string,
  options: FetchOptions = {},
): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = Math.max(1, Math.floor(Number(options.timeoutMs) || HOLDINGS_FETCH_TIMEOUT_MS));
  const externalSignal = options.signal ?? null;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = () => controller.abort();
  if (externalSignal) {
    if (externalSignal.aborted) {
      forwardAbort();
    } else {
      externalSignal.addEventListener('abort', forwardAbort, { once: true });
    }
  }

  try {
    console.log(`[fetch] ${label}: GET ${url}`);
    const resp = await fetchImpl(url, {
      method: 'GET',
      signal: controller.signal,
      headers: {
        'User-Agent': HOLDINGS_USER_AGENT,
        Accept: accept,
        'Accept-Language': 'en-US,en;q=0.5',
      },
    });
    if (!resp.ok) {
      const body = (await resp.text().catch(() => '')).trim().slice(0, 180);
      throw new FetchError(`${label} request failed (${resp.status}): ${body || resp.statusText || 'no body'}`, resp.status);
    }
    return await resp.text();
  } catch (err: unknown) {
    if (err instanceof FetchError) throw err;
    if (isAbortError(err) || controller.signal.aborted) {
      if (timedOut) {
        throw new FetchError(`${label} request timed out after ${timeoutMs}ms`, 504, { cause: err });
      }
      throw new FetchError(`${label} request aborted`, 499, { cause: err });
    }
    throw new FetchError(`${label} request failed: ${describeError(err)}`, null, { cause: err });
  } finally {
    clearTimeout(timeout);
    if (externalSignal) {
      externalSignal.removeEventListener('abort', forwardAbort);
    }
  }
}

export function parseCsvHoldings(text: string): RawHoldings {
  const { columns, rows } = parseCsv(text);
  return { columns, rows, pageDate: '' };
}

export function parseHtmlHoldings(html: string, label = 'page'): RawHoldings {
  const table = extractHoldingsTable(html);
  if (!table) {
    throw new FetchError(`${label}: no holdings table with data rows found on the page`);
  }
  if (table.headers.length > 0 && table.rows[0].length !== table.headers.length) {
    console.warn(
      `[fetch] ${label}: column count mismatch (headers ${table.headers.length}, data ${table.rows[0].length})`,
    );
  }
  return {
    columns: table.headers,
    rows: rowsToRecords(table.headers, table.rows),
    pageDate: parseHoldingsAsOf(pageText(html)),
  };
}

export async function fetchRawHoldings(source: HoldingsSource, options: FetchOptions = {}): Promise<RawHoldings> {
  const text = await fetchSourceText(source.url, source.fund, ACCEPT_BY_KIND[source.kind], options);
  const raw = source.kind === 'csv' ? parseCsvHoldings(text) : parseHtmlHoldings(text, source.fund);
  console.log(`[fetch] ${source.fund}: received ${raw.rows.length} row(s)`);
  return raw;
}

/** Offline sample rows for a source, from the JSON fixture its config names. */
export async function loadDemoHoldings(source: HoldingsSource, configDir: string = CONFIG_DIR): Promise<RawHoldings> {
  if (!source.demoFile) {
    throw new SourceConfigError(`Source ${source.id} has no demo data configured`);
  }
  const filePath = path.resolve(configDir, source.demoFile);
  let payload: unknown;
  try {
    payload = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (err: unknown) {
    throw new SourceConfigError(`Cannot load demo data ${filePath}: ${describeError(err)}`, { cause: err });
  }
  const parsed = DemoHoldingsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SourceConfigError(`Invalid demo data ${filePath}: ${formatZodIssues(parsed.error)}`);
  }
  const { columns, rows, asOf } = parsed.data;
  console.log(`[fetch] ${source.fund}: using demo data (${rows.length} holdings as of ${asOf})`);
  return {
    columns,
    rows: rowsToRecords(columns, rows),
    pageDate: parseHoldingsAsOf(`Holdings as of ${asOf}`),
  };
}
