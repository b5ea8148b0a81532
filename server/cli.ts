/**
 * Command-line surface.
 *
 *   merge   fold pending <prefix>_holdings_*.csv snapshots into the constituents table
 *   fetch   download a source's holdings, print the report, write dated CSV/JSON
 *   report  print the report for a saved snapshot file
 *   init    create an empty constituents table when none exists
 *
 * runCli resolves to the process exit code: 0 for success or a no-op, 1 for failure.
 */

import * as path from 'path';
import { parseArgs } from 'util';
import {
  CONSTITUENTS_TABLE_FILE,
  DEFAULT_SOURCE_ID,
  HOLDINGS_DATA_DIR,
  HOLDINGS_FETCH_TIMEOUT_MS,
  HOLDINGS_TOP_N,
} from './config.js';
import { describeError, isHoldingsError } from './lib/errors.js';
import { initConstituentsTable } from './data/constituentsTable.js';
import { getHoldingsSource, loadHoldingsSources } from './data/holdingsSources.js';
import { runMergeBatch } from './orchestrators/mergeBatchOrchestrator.js';
import { loadSnapshotFile, runFetchHoldings } from './orchestrators/fetchHoldingsOrchestrator.js';
import { formatHoldingsReport } from './services/holdingsReport.js';
import type { FetchImpl } from './services/holdingsFetcher.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export const USAGE = [
  'Usage: etf-holdings <command> [options]',
  '',
  'Commands:',
  '  merge   [--source id] [--table file] [--dir dir] [--dry-run] [--allow-empty] [--strict]',
  '  fetch   [--source id] [--out dir] [--demo] [--fallback-demo] [--format csv|json]... [--top n]',
  '  report  <snapshot.csv> [--source id] [--top n]',
  '  init    [--table file]',
  '',
  'Common: --sources <sources.json>',
].join('\n');

export interface CliDeps {
  fetchImpl?: FetchImpl;
  now?: Date;
}

const OPTIONS = {
  source: { type: 'string' },
  sources: { type: 'string' },
  table: { type: 'string' },
  dir: { type: 'string' },
  out: { type: 'string' },
  format: { type: 'string', multiple: true },
  top: { type: 'string' },
  'dry-run': { type: 'boolean' },
  'allow-empty': { type: 'boolean' },
  strict: { type: 'boolean' },
  demo: { type: 'boolean' },
  'fallback-demo': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseFormats(values: string[] | undefined): Array<'csv' | 'json'> {
  if (!values || values.length === 0) return ['csv', 'json'];
  return values.map((value) => {
    const format = value.trim().toLowerCase();
    if (format !== 'csv' && format !== 'json') {
      throw new Error(`--format must be csv or json (received: ${value})`);
    }
    return format;
  });
}

function parseTopN(value: string | undefined): number {
  if (value === undefined) return HOLDINGS_TOP_N;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`--top must be a positive integer (received: ${value})`);
  }
  return n;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err: unknown) {
    console.error(`[cli] ${describeError(err)}`);
    console.error(USAGE);
    return EXIT_FAILURE;
  }
  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return values.help ? EXIT_OK : EXIT_FAILURE;
  }

  try {
    if (command === 'init') {
      const tablePath = path.resolve(values.table ?? CONSTITUENTS_TABLE_FILE);
      const created = await initConstituentsTable(tablePath);
      console.log(created ? `[init] Created ${tablePath}` : `[init] ${tablePath} already exists, left unchanged`);
      return EXIT_OK;
    }

    const sources = await loadHoldingsSources(values.sources);
    const source = getHoldingsSource(sources, values.source ?? DEFAULT_SOURCE_ID);

    if (command === 'merge') {
      const tablePath = path.resolve(values.table ?? CONSTITUENTS_TABLE_FILE);
      const snapshotDir = path.resolve(values.dir ?? HOLDINGS_DATA_DIR);
      try {
        const result = await runMergeBatch({ source, tablePath, snapshotDir, dryRun: values['dry-run'] });
        const skipped = result.files.filter((file) => file.status === 'skipped');
        if (skipped.length > 0) {
          console.warn(`[merge] ${skipped.length} file(s) skipped: ${skipped.map((file) => file.file).join(', ')}`);
        }
        console.log(`[merge] Columns: ${result.columns.join(', ')}`);
        return values.strict && skipped.length > 0 ? EXIT_FAILURE : EXIT_OK;
      } catch (err: unknown) {
        if (isHoldingsError(err, 'NO_SNAPSHOTS') && values['allow-empty']) {
          console.log(`[merge] ${err.message}; nothing to do`);
          return EXIT_OK;
        }
        throw err;
      }
    }

    if (command === 'fetch') {
      await runFetchHoldings({
        source,
        outputDir: path.resolve(values.out ?? HOLDINGS_DATA_DIR),
        demo: values.demo,
        fallbackToDemo: values['fallback-demo'],
        formats: parseFormats(values.format),
        topN: parseTopN(values.top),
        timeoutMs: HOLDINGS_FETCH_TIMEOUT_MS,
        fetchImpl: deps.fetchImpl,
        now: deps.now,
      });
      return EXIT_OK;
    }

    if (command === 'report') {
      const file = rest[0];
      if (!file) {
        console.error('[cli] report needs a snapshot file');
        return EXIT_FAILURE;
      }
      const snapshot = await loadSnapshotFile(source, path.resolve(file));
      formatHoldingsReport(snapshot, parseTopN(values.top)).forEach((line) => console.log(line));
      return EXIT_OK;
    }

    console.error(`[cli] Unknown command: ${command}`);
    console.error(USAGE);
    return EXIT_FAILURE;
  } catch (err: unknown) {
    if (isHoldingsError(err)) {
      console.error(`[${command}] ${err.name}: ${err.message}`);
    } else {
      console.error(`[${command}] Error:`, err);
    }
    return EXIT_FAILURE;
  }
}
