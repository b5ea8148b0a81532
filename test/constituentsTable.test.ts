import test from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

import {
  initConstituentsTable,
  parseConstituentsTable,
  readConstituentsTable,
  serializeConstituentsTable,
  writeConstituentsTable,
} from '../server/data/constituentsTable.js';
import { MissingTableError, ParseError, SchemaError } from '../server/lib/errors.js';

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'constituents-'));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

test('blank and NaN cells load as 0 and are counted', () => {
  const loaded = parseConstituentsTable('ticker,20250101,20250102\nAAPL,5,\nTSLA,nan,2\n');
  assert.equal(loaded.blankCells, 2);
  assert.equal(loaded.ledger.get('AAPL', '20250102'), 0);
  assert.equal(serializeConstituentsTable(loaded.ledger), 'ticker,20250101,20250102\nAAPL,5,0\nTSLA,0,2\n');
});

test('a header-only table loads as empty', () => {
  const loaded = parseConstituentsTable('ticker\n');
  assert.equal(loaded.ledger.rowCount, 0);
  assert.deepEqual(loaded.ledger.dateColumns, []);
  assert.equal(serializeConstituentsTable(loaded.ledger), 'ticker\n');
});

test('the first column must be ticker', () => {
  assert.throws(() => parseConstituentsTable('symbol,20250101\nAAPL,1\n'), SchemaError);
});

test('duplicate tickers are a schema error', () => {
  assert.throws(() => parseConstituentsTable('ticker,20250101\nAAPL,1\nAAPL,2\n'), SchemaError);
});

test('non-numeric cells are a parse error with the row number', () => {
  assert.throws(
    () => parseConstituentsTable('ticker,20250101\nAAPL,1\nTSLA,abc\n'),
    (err: unknown) => err instanceof ParseError && err.row === 2,
  );
});

test('a row without a ticker fails the load', () => {
  assert.throws(
    () => parseConstituentsTable('ticker,20250101\n,3\nAAPL,1\n'),
    (err: unknown) => err instanceof SchemaError && err.message === 'constituents table: row 1 has no ticker',
  );
});

// ---------------------------------------------------------------------------
// Header
// ---------------------------------------------------------------------------

test('a repeated date header is a schema error', () => {
  assert.throws(
    () => parseConstituentsTable('ticker,20250101,20250101\nAAPL,1,2\n'),
    (err: unknown) => err instanceof SchemaError && err.message === 'constituents table: duplicate column "20250101"',
  );
});

test('a legacy ISO header and its compact form count as the same date', () => {
  assert.throws(() => parseConstituentsTable('ticker,2025-01-01,20250101\nAAPL,1,2\n'), SchemaError);
});

test('headers other than dates are rejected', () => {
  assert.throws(
    () => parseConstituentsTable('ticker,20250101,notes\nAAPL,1,x\n'),
    (err: unknown) => err instanceof SchemaError && err.message === 'constituents table: column "notes" is not a YYYYMMDD date',
  );
  assert.throws(() => parseConstituentsTable('ticker,20250101,ticker\nAAPL,1,AAPL\n'), SchemaError);
  assert.throws(() => parseConstituentsTable('ticker,20250230\nAAPL,1\n'), SchemaError);
});

test('legacy ISO headers load and keep their spelling', () => {
  const loaded = parseConstituentsTable('ticker,2025-01-01,20250102\nAAPL,1,2\n');
  assert.deepEqual(loaded.ledger.dateColumns, ['2025-01-01', '20250102']);
  assert.equal(serializeConstituentsTable(loaded.ledger), 'ticker,2025-01-01,20250102\nAAPL,1,2\n');
});

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

test('reading a missing table raises MissingTableError', async () => {
  await withTempDir(async (dir) => {
    const tablePath = path.join(dir, 'missing.csv');
    await assert.rejects(readConstituentsTable(tablePath), MissingTableError);
  });
});

test('write replaces the table and leaves no temp file behind', async () => {
  await withTempDir(async (dir) => {
    const tablePath = path.join(dir, 'table.csv');
    await fs.writeFile(tablePath, 'ticker,20250101\nAAPL,5\n', 'utf8');
    const { ledger } = await readConstituentsTable(tablePath);
    ledger.addTicker('MSFT');
    await writeConstituentsTable(tablePath, ledger);

    assert.equal(await fs.readFile(tablePath, 'utf8'), 'ticker,20250101\nAAPL,5\nMSFT,0\n');
    assert.deepEqual(await fs.readdir(dir), ['table.csv']);
  });
});

test('init creates a header-only table once', async () => {
  await withTempDir(async (dir) => {
    const tablePath = path.join(dir, 'nested', 'table.csv');
    assert.equal(await initConstituentsTable(tablePath), true);
    assert.equal(await fs.readFile(tablePath, 'utf8'), 'ticker\n');

    await fs.writeFile(tablePath, 'ticker,20250101\nAAPL,5\n', 'utf8');
    assert.equal(await initConstituentsTable(tablePath), false);
    assert.equal(await fs.readFile(tablePath, 'utf8'), 'ticker,20250101\nAAPL,5\n');
  });
});
