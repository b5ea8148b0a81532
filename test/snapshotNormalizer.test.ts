import test from 'node:test';
import assert from 'node:assert/strict';

import { HoldingRecordSchema } from '../server/lib/apiSchemas.js';
import { ParseError, SchemaError } from '../server/lib/errors.js';
import { cleanNumber, normalizeHoldings, type NormalizeInput } from '../server/services/snapshotNormalizer.js';
import type { HoldingRecord } from '../shared/holdings-types.js';

const SOURCE: NormalizeInput['source'] = {
  id: 'grny',
  fund: 'GRNY',
  fields: {
    ticker: ['Ticker'],
    weight: ['Weight'],
    name: ['Name'],
    sector: ['Sector'],
    marketValue: ['Market Value'],
    price: ['Last Price'],
  },
};

const COLUMNS = ['Ticker', 'Name', 'Sector', 'Weight', 'Market Value', 'Last Price'];

function input(rows: Array<Record<string, string>>, columns: string[] = COLUMNS): NormalizeInput {
  return {
    source: SOURCE,
    columns,
    rows,
    observationDate: '20250314',
    dateOrigin: 'page',
    fetchedAt: '2025-03-14T21:00:00.000Z',
  };
}

// ---------------------------------------------------------------------------
// cleanNumber
// ---------------------------------------------------------------------------

test('cleanNumber reads money, percent and accounting negatives', () => {
  assert.equal(cleanNumber('$1,234.50'), 1234.5);
  assert.equal(cleanNumber('-0.42%'), -0.42);
  assert.equal(cleanNumber('(1,000)'), -1000);
  assert.equal(cleanNumber('-$5'), -5);
});

test('cleanNumber returns null for blanks and NaN for garbage', () => {
  assert.equal(cleanNumber(''), null);
  assert.equal(cleanNumber('-'), null);
  assert.equal(cleanNumber('N/A'), null);
  assert.ok(Number.isNaN(cleanNumber('lots')));
});

// ---------------------------------------------------------------------------
// normalizeHoldings
// ---------------------------------------------------------------------------

test('normalizeHoldings maps declared columns and nulls unreadable optional cells', () => {
  const { snapshot, unreadableCells } = normalizeHoldings(
    input([
      { Ticker: 'AAPL', Name: 'Apple Inc.', Sector: 'Technology', Weight: '2.61%', 'Market Value': '$41,200,500', 'Last Price': 'n/a' },
      { Ticker: ' ', Name: 'Cash', Sector: '', Weight: '0.10%', 'Market Value': '', 'Last Price': '' },
      { Ticker: 'MSFT', Name: '', Sector: 'Technology', Weight: '2.57%', 'Market Value': '??', 'Last Price': '$410.25' },
    ]),
  );

  assert.equal(unreadableCells, 1);
  assert.equal(snapshot.sourceId, 'grny');
  assert.equal(snapshot.fund, 'GRNY');
  assert.equal(snapshot.observationDate, '20250314');
  assert.deepEqual(snapshot.holdings, [
    {
      ticker: 'AAPL',
      weightPercent: 2.61,
      name: 'Apple Inc.',
      cusip: null,
      sector: 'Technology',
      shares: null,
      marketValue: 41200500,
      price: null,
      priceChangePercent: null,
    },
    {
      ticker: 'MSFT',
      weightPercent: 2.57,
      name: null,
      cusip: null,
      sector: 'Technology',
      shares: null,
      marketValue: null,
      price: 410.25,
      priceChangePercent: null,
    },
  ]);
});

test('a repeated ticker keeps the last row', () => {
  const { snapshot } = normalizeHoldings(
    input(
      [
        { Ticker: 'AAPL', Weight: '1' },
        { Ticker: 'AAPL', Weight: '2' },
      ],
      ['Ticker', 'Weight'],
    ),
  );
  assert.deepEqual(
    snapshot.holdings.map((holding) => [holding.ticker, holding.weightPercent]),
    [['AAPL', 2]],
  );
});

test('missing weight column is a schema error', () => {
  assert.throws(
    () => normalizeHoldings(input([{ Ticker: 'AAPL' }], ['Ticker'])),
    (err: unknown) => err instanceof SchemaError && err.missingFields.join(',') === 'weight',
  );
});

test('non-numeric and out-of-range weights are parse errors', () => {
  assert.throws(
    () => normalizeHoldings(input([{ Ticker: 'AAPL', Weight: 'high' }], ['Ticker', 'Weight'])),
    (err: unknown) => err instanceof ParseError && err.row === 1,
  );
  assert.throws(() => normalizeHoldings(input([{ Ticker: 'AAPL', Weight: '150%' }], ['Ticker', 'Weight'])), ParseError);
});

test('a table without any ticker rows is a schema error', () => {
  assert.throws(() => normalizeHoldings(input([{ Ticker: '', Weight: '1' }], ['Ticker', 'Weight'])), SchemaError);
});

// ---------------------------------------------------------------------------
// Holding record schema
// ---------------------------------------------------------------------------

test('HoldingRecordSchema accepts a shared HoldingRecord and rejects a weight above 100', () => {
  const record: HoldingRecord = {
    ticker: 'NVDA',
    weightPercent: 3.2,
    name: null,
    cusip: null,
    sector: 'Technology',
    shares: 1200,
    marketValue: null,
    price: null,
    priceChangePercent: -0.4,
  };
  const parsed = HoldingRecordSchema.safeParse(record);
  assert.equal(parsed.success, true);
  if (parsed.success) {
    const roundTripped: HoldingRecord = parsed.data;
    assert.deepEqual(roundTripped, record);
  }
  assert.equal(HoldingRecordSchema.safeParse({ ...record, weightPercent: 101 }).success, false);
});

test('normalized holdings are plain shared HoldingRecord values', () => {
  const { snapshot } = normalizeHoldings(input([{ Ticker: 'AAPL', Weight: '4' }], ['Ticker', 'Weight']));
  const holdings: HoldingRecord[] = snapshot.holdings;
  assert.deepEqual(holdings, [
    {
      ticker: 'AAPL',
      weightPercent: 4,
      name: null,
      cusip: null,
      sector: null,
      shares: null,
      marketValue: null,
      price: null,
      priceChangePercent: null,
    },
  ]);
});
