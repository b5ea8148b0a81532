// Shared holdings types used by the fetch, merge and report paths.

/** One holding after normalization; enrichment fields are null when the source omits them. */
export interface HoldingRecord {
  ticker: string;
  /** Percent of fund, 0-100. */
  weightPercent: number;
  name: string | null;
  cusip: string | null;
  sector: string | null;
  shares: number | null;
  marketValue: number | null;
  price: number | null;
  priceChangePercent: number | null;
}

/** One dated capture of a fund's holdings after normalization. */
export interface HoldingsSnapshot {
  sourceId: string;
  fund: string;
  /** Canonical `YYYYMMDD` observation date. */
  observationDate: string;
  /** Where the observation date came from. */
  dateOrigin: 'content' | 'page' | 'filename' | 'fetch-date';
  /** ISO timestamp of the fetch. */
  fetchedAt: string;
  holdings: HoldingRecord[];
}

/** Ticker and weight pairs ready to fold into the constituents table. */
export interface SnapshotWeights {
  observationDate: string;
  weights: Array<{ ticker: string; weightPercent: number }>;
}

export interface SummaryStats {
  fund: string;
  totalHoldings: number;
  holdingsDate: string;
  fetchedAt: string;
  totalWeight: number | null;
  averageWeight: number | null;
  medianWeight: number | null;
  maxWeight: number | null;
  minWeight: number | null;
  topTenWeight: number | null;
  totalMarketValue: number | null;
  totalAumFormatted: string | null;
}

export interface SectorBreakdownRow {
  sector: string;
  totalWeight: number;
  averageWeight: number;
  count: number;
  totalMarketValue: number | null;
}

export type MergeFileStatus = 'merged' | 'duplicate' | 'skipped';

export interface MergeStats {
  /** Rows with a non-zero weight in the new column. */
  matched: number;
  total: number;
  newTickers: string[];
  /** Rows already in the table that the snapshot did not report. */
  droppedTickers: string[];
}

export interface MergeFileOutcome {
  file: string;
  status: MergeFileStatus;
  dateColumn: string | null;
  dateOrigin: 'content' | 'filename' | null;
  stats: MergeStats | null;
  /** Error code when skipped. */
  errorCode: string | null;
  message: string | null;
}

export interface MergeBatchResult {
  tablePath: string;
  changed: boolean;
  written: boolean;
  rowCount: number;
  columns: string[];
  files: MergeFileOutcome[];
}
