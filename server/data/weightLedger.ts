/**
 * In-memory ledger of observed weights keyed by (ticker, date).
 *
 * The wide constituents table (one row per ticker, one column per date) is a
 * view over this ledger. Tickers and date columns are kept in insertion order
 * and are only ever appended, so materializing the view never reorders a
 * column or row that already existed. Any (ticker, date) pair without an
 * entry reads as 0, the "not held" sentinel.
 */

export const ABSENT_WEIGHT = 0;
export const TICKER_COLUMN = 'ticker';

export interface WideTable {
  columns: string[];
  rows: Array<Record<string, string | number>>;
}

function entryKey(ticker: string, dateColumn: string): string {
  return `${ticker}\u0000${dateColumn}`;
}

export class WeightLedger {
  private readonly tickerOrder: string[] = [];
  private readonly tickerSet = new Set<string>();
  private readonly dateOrder: string[] = [];
  private readonly dateSet = new Set<string>();
  private readonly weights = new Map<string, number>();

  get tickers(): readonly string[] {
    return this.tickerOrder;
  }

  get dateColumns(): readonly string[] {
    return this.dateOrder;
  }

  get rowCount(): number {
    return this.tickerOrder.length;
  }

  hasTicker(ticker: string): boolean {
    return this.tickerSet.has(ticker);
  }

  hasDateColumn(dateColumn: string): boolean {
    return this.dateSet.has(dateColumn);
  }

  /** Appends a row. Returns false when the ticker is already present. */
  addTicker(ticker: string): boolean {
    if (this.tickerSet.has(ticker)) return false;
    this.tickerSet.add(ticker);
    this.tickerOrder.push(ticker);
    return true;
  }

  /** Appends a date column at the end. Returns false when it already exists. */
  addDateColumn(dateColumn: string): boolean {
    if (dateColumn === TICKER_COLUMN) {
      throw new Error(`"${TICKER_COLUMN}" cannot be used as a date column`);
    }
    if (this.dateSet.has(dateColumn)) return false;
    this.dateSet.add(dateColumn);
    this.dateOrder.push(dateColumn);
    return true;
  }

  get(ticker: string, dateColumn: string): number {
    return this.weights.get(entryKey(ticker, dateColumn)) ?? ABSENT_WEIGHT;
  }

  set(ticker: string, dateColumn: string, weight: number): void {
    if (!this.tickerSet.has(ticker)) {
      throw new Error(`Unknown ticker ${ticker}`);
    }
    if (!this.dateSet.has(dateColumn)) {
      throw new Error(`Unknown date column ${dateColumn}`);
    }
    if (!Number.isFinite(weight)) {
      throw new Error(`Weight for ${ticker} on ${dateColumn} must be finite`);
    }
    if (weight === ABSENT_WEIGHT) {
      this.weights.delete(entryKey(ticker, dateColumn));
    } else {
      this.weights.set(entryKey(ticker, dateColumn), weight);
    }
  }

  /** Weights for one date column, in row order. */
  column(dateColumn: string): number[] {
    return this.tickerOrder.map((ticker) => this.get(ticker, dateColumn));
  }

  toWideTable(): WideTable {
    const columns = [TICKER_COLUMN, ...this.dateOrder];
    const rows = this.tickerOrder.map((ticker) => {
      const row: Record<string, string | number> = { [TICKER_COLUMN]: ticker };
      for (const dateColumn of this.dateOrder) {
        row[dateColumn] = this.get(ticker, dateColumn);
      }
      return row;
    });
    return { columns, rows };
  }
}
