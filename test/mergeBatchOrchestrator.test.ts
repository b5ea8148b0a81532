import test from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

import type { HoldingsSource } from '../server/lib/apiSchemas.js';
import { MissingTableError, NoSnapshotsError, SchemaError } from '../server/lib/errors.js';
import { runMergeBatch } from '../server/orchestrators/mergeBatchOrchestrator.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SOURCE: HoldingsSource = {
  id: 'arkk',
  fund: 'ARKK',
  kind: 'csv',
  url: 'https://example.com/arkk.csv',
  filePrefix: 'arkk',
  fields: {
    ticker: ['ticker'],
    weight: ['weight (%)'],
    date: ['date'],
    name: ['company'],
  },
};

const HEADER = 'date,company,ticker,weight (%)';

async function withWorkspace(
  table: string | null,
  files: Record<string, string>,
  fn: (dir: string, tablePath: string) => Promise<void>,
): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-batch-'));
  const tablePath = path.join(dir, 'arkk_constituents.csv');
  try {
    if (table !== null) await fs.writeFile(tablePath, table, 'utf8');
    for (const [name, body] of Object.entries(files)) {
      await fs.writeFile(path.join(dir, name), body, 'utf8');
    }
    await fn(dir, tablePath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

test('merges a new snapshot and is a no-op on rerun', async () => {
  await withWorkspace(
    'ticker,20250101\nAAPL,5.0\n',
    {
      'arkk_holdings_20250102.csv': `${HEADER}\n01/02/2025,Apple Inc,AAPL,4.50\n01/02/2025,Tesla Inc,TSLA,2.00\n`,
    },
    async (dir, tablePath) => {
      const first = await runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir });
      assert.equal(first.changed, true);
      assert.equal(first.written, true);
      assert.deepEqual(first.columns, ['ticker', '20250101', '20250102']);
      assert.deepEqual(first.files, [
        {
          file: 'arkk_holdings_20250102.csv',
          status: 'merged',
          dateColumn: '20250102',
          dateOrigin: 'content',
          stats: { matched: 2, total: 2, newTickers: ['TSLA'], droppedTickers: [] },
          errorCode: null,
          message: null,
        },
      ]);
      const merged = await fs.readFile(tablePath, 'utf8');
      assert.equal(merged, 'ticker,20250101,20250102\nAAPL,5,4.5\nTSLA,0,2\n');

      const second = await runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir });
      assert.equal(second.changed, false);
      assert.equal(second.written, false);
      assert.equal(second.files[0].status, 'duplicate');
      assert.equal(second.files[0].dateColumn, '20250102');
      assert.equal(await fs.readFile(tablePath, 'utf8'), merged);
    },
  );
});

test('applies files in date order and skips bad files without stopping', async () => {
  await withWorkspace(
    'ticker\n',
    {
      'arkk_holdings_20250104.csv': `${HEADER}\n01/04/2025,Apple Inc,AAPL,3\n`,
      'arkk_holdings_20250103.csv': `${HEADER}\n01/03/2025,Apple Inc,AAPL,4\n01/03/2025,Microsoft,MSFT,1\n`,
      'arkk_holdings_20250105.csv': 'date,ticker\n01/05/2025,AAPL\n',
      'arkk_holdings_latest.csv': 'ticker,weight (%)\nAAPL,1\n',
      'notes.txt': 'not a snapshot',
    },
    async (dir, tablePath) => {
      const result = await runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir });
      assert.deepEqual(result.columns, ['ticker', '20250103', '20250104']);
      assert.deepEqual(
        result.files.map((file) => [file.file, file.status, file.errorCode]),
        [
          ['arkk_holdings_20250103.csv', 'merged', null],
          ['arkk_holdings_20250104.csv', 'merged', null],
          ['arkk_holdings_20250105.csv', 'skipped', 'SCHEMA'],
          ['arkk_holdings_latest.csv', 'skipped', 'DATE_FORMAT'],
        ],
      );
      assert.equal(await fs.readFile(tablePath, 'utf8'), 'ticker,20250103,20250104\nAAPL,4,3\nMSFT,1,0\n');
    },
  );
});

test('the content date wins over the file name date', async () => {
  await withWorkspace(
    'ticker\n',
    { 'arkk_holdings_20250110.csv': `${HEADER}\n01/09/2025,Apple Inc,AAPL,4\n` },
    async (dir, tablePath) => {
      const result = await runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir });
      assert.deepEqual(result.columns, ['ticker', '20250109']);
      assert.equal(result.files[0].dateOrigin, 'content');
    },
  );
});

test('the file name date is used when rows carry no date', async () => {
  await withWorkspace(
    'ticker\n',
    { 'arkk_holdings_20250110.csv': 'ticker,weight (%)\nAAPL,4\n' },
    async (dir, tablePath) => {
      const result = await runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir });
      assert.deepEqual(result.columns, ['ticker', '20250110']);
      assert.equal(result.files[0].dateOrigin, 'filename');
    },
  );
});

test('a snapshot older than the last column is still appended at the end', async () => {
  await withWorkspace(
    'ticker,20250105\nAAPL,1\n',
    { 'arkk_holdings_20250102.csv': `${HEADER}\n01/02/2025,Apple Inc,AAPL,2\n` },
    async (dir, tablePath) => {
      const result = await runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir });
      assert.deepEqual(result.columns, ['ticker', '20250105', '20250102']);
      assert.equal(await fs.readFile(tablePath, 'utf8'), 'ticker,20250105,20250102\nAAPL,1,2\n');
    },
  );
});

test('bad weights skip the file and leave the table untouched', async () => {
  const table = 'ticker,20250101\nAAPL,5\n';
  await withWorkspace(
    table,
    {
      'arkk_holdings_20250102.csv': `${HEADER}\n01/02/2025,Apple Inc,AAPL,abc\n`,
      'arkk_holdings_20250103.csv': `${HEADER}\n01/03/2025,Apple Inc,AAPL,150\n`,
    },
    async (dir, tablePath) => {
      const result = await runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir });
      assert.equal(result.changed, false);
      assert.deepEqual(
        result.files.map((file) => [file.status, file.errorCode]),
        [
          ['skipped', 'PARSE'],
          ['skipped', 'PARSE'],
        ],
      );
      assert.equal(await fs.readFile(tablePath, 'utf8'), table);
    },
  );
});

test('dry run computes the merge without writing', async () => {
  const table = 'ticker,20250101\nAAPL,5\n';
  await withWorkspace(
    table,
    { 'arkk_holdings_20250102.csv': `${HEADER}\n01/02/2025,Apple Inc,AAPL,4\n` },
    async (dir, tablePath) => {
      const result = await runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir, dryRun: true });
      assert.equal(result.changed, true);
      assert.equal(result.written, false);
      assert.deepEqual(result.columns, ['ticker', '20250101', '20250102']);
      assert.equal(await fs.readFile(tablePath, 'utf8'), table);
    },
  );
});

// ---------------------------------------------------------------------------
// Run-level failures
// ---------------------------------------------------------------------------

test('a missing table fails the run', async () => {
  await withWorkspace(null, { 'arkk_holdings_20250102.csv': `${HEADER}\n01/02/2025,Apple Inc,AAPL,4\n` }, async (dir, tablePath) => {
    await assert.rejects(runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir }), MissingTableError);
  });
});

test('no snapshot files fails the run', async () => {
  await withWorkspace('ticker\n', { 'grny_holdings_20250102.csv': 'ticker,weight (%)\nAAPL,1\n' }, async (dir, tablePath) => {
    await assert.rejects(runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir }), NoSnapshotsError);
  });
});

test('a table with an unkeyed row fails the run and is left as written', async () => {
  const table = 'ticker,20250101\n,3\nAAPL,5.0\n';
  await withWorkspace(
    table,
    { 'arkk_holdings_20250102.csv': `${HEADER}\n01/02/2025,Apple Inc,AAPL,4\n` },
    async (dir, tablePath) => {
      await assert.rejects(runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir }), SchemaError);
      assert.equal(await fs.readFile(tablePath, 'utf8'), table);
    },
  );
});

test('a table with a repeated date header fails the run and is left as written', async () => {
  const table = 'ticker,20250101,20250101\nAAPL,1,2\n';
  await withWorkspace(
    table,
    { 'arkk_holdings_20250102.csv': `${HEADER}\n01/02/2025,Apple Inc,AAPL,4\n` },
    async (dir, tablePath) => {
      await assert.rejects(runMergeBatch({ source: SOURCE, tablePath, snapshotDir: dir }), SchemaError);
      assert.equal(await fs.readFile(tablePath, 'utf8'), table);
    },
  );
});
