import { formatDateKeyLong } from '../lib/dateUtils.js';
import type { HoldingRecord, HoldingsSnapshot, SectorBreakdownRow, SummaryStats } from '../../shared/holdings-types.js';

const RULE_WIDTH = 100;
const UNCLASSIFIED_SECTOR = 'Unclassified';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function formatUsd(value: number): string {
  const sign = value < 0 ? '-' : '';
  return `${sign}$${Math.abs(value).toLocaleString('en-US', { maximumFractionDigits: 0 })}`;
}

/** Holdings by weight, heaviest first; ties keep their input order. */
export function topHoldings(holdings: HoldingRecord[], n: number): HoldingRecord[] {
  return holdings
    .map((holding, index) => ({ holding, index }))
    .sort((a, b) => b.holding.weightPercent - a.holding.weightPercent || a.index - b.index)
    .slice(0, Math.max(0, n))
    .map(({ holding }) => holding);
}

export function computeSummaryStats(snapshot: HoldingsSnapshot): SummaryStats {
  const weights = snapshot.holdings.map((holding) => holding.weightPercent);
  const marketValues = snapshot.holdings
    .map((holding) => holding.marketValue)
    .filter((value): value is number => value !== null);
  const hasWeights = weights.length > 0;
  const totalWeight = weights.reduce((sum, w) => sum + w, 0);
  const totalMarketValue = marketValues.length > 0 ? marketValues.reduce((sum, v) => sum + v, 0) : null;

  return {
    fund: snapshot.fund,
    totalHoldings: snapshot.holdings.length,
    holdingsDate: formatDateKeyLong(snapshot.observationDate),
    fetchedAt: snapshot.fetchedAt,
    totalWeight: hasWeights ? totalWeight : null,
    averageWeight: hasWeights ? totalWeight / weights.length : null,
    medianWeight: hasWeights ? median(weights) : null,
    maxWeight: hasWeights ? Math.max(...weights) : null,
    minWeight: hasWeights ? Math.min(...weights) : null,
    topTenWeight: hasWeights
      ? topHoldings(snapshot.holdings, 10).reduce((sum, holding) => sum + holding.weightPercent, 0)
      : null,
    totalMarketValue,
    totalAumFormatted: totalMarketValue === null ? null : formatUsd(totalMarketValue),
  };
}

/**
 * Weight totals per sector, largest first. Market value totals are null when
 * no holding reports a market value. Holdings without a sector are grouped
 * under "Unclassified".
 */
export function sectorBreakdown(holdings: HoldingRecord[]): SectorBreakdownRow[] {
  const groups = new Map<string, HoldingRecord[]>();
  for (const holding of holdings) {
    const sector = holding.sector ?? UNCLASSIFIED_SECTOR;
    const group = groups.get(sector);
    if (group) {
      group.push(holding);
    } else {
      groups.set(sector, [holding]);
    }
  }
  const anyMarketValue = holdings.some((holding) => holding.marketValue !== null);
  return Array.from(groups, ([sector, members]) => {
    const totalWeight = members.reduce((sum, holding) => sum + holding.weightPercent, 0);
    return {
      sector,
      totalWeight: round2(totalWeight),
      averageWeight: round2(totalWeight / members.length),
      count: members.length,
      totalMarketValue: anyMarketValue
        ? round2(members.reduce((sum, holding) => sum + (holding.marketValue ?? 0), 0))
        : null,
    };
  }).sort((a, b) => b.totalWeight - a.totalWeight || a.sector.localeCompare(b.sector));
}

function titleCase(key: string): string {
  return key
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/^./, (c) => c.toUpperCase())
    .replace(/ ([a-z])/g, (_, c: string) => ` ${c.toUpperCase()}`);
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

/** Plain-text report: summary, top holdings, sector breakdown. */
export function formatHoldingsReport(snapshot: HoldingsSnapshot, topN = 10): string[] {
  const rule = '='.repeat(RULE_WIDTH);
  const lines: string[] = [rule, `${snapshot.fund} HOLDINGS REPORT`, rule, '', 'SUMMARY STATISTICS:', '-'.repeat(RULE_WIDTH)];

  const stats = computeSummaryStats(snapshot);
  const entries: Array<[string, string | number | null]> = [
    ['fund', stats.fund],
    ['totalHoldings', stats.totalHoldings],
    ['holdingsDate', stats.holdingsDate],
    ['fetchedAt', stats.fetchedAt],
    ['totalWeight', stats.totalWeight],
    ['averageWeight', stats.averageWeight],
    ['medianWeight', stats.medianWeight],
    ['maxWeight', stats.maxWeight],
    ['minWeight', stats.minWeight],
    ['topTenWeight', stats.topTenWeight],
    ['totalMarketValue', stats.totalMarketValue],
    ['totalAumFormatted', stats.totalAumFormatted],
  ];
  for (const [key, value] of entries) {
    if (value === null) continue;
    const text = typeof value === 'number' && !Number.isInteger(value) ? value.toFixed(2) : String(value);
    lines.push(`${pad(titleCase(key), 30)}: ${text}`);
  }

  lines.push('', rule, `TOP ${topN} HOLDINGS:`, rule);
  const top = topHoldings(snapshot.holdings, topN);
  lines.push(`${pad('Ticker', 8)} ${pad('Name', 32)} ${pad('Sector', 26)} Weight (%)`);
  for (const holding of top) {
    lines.push(
      `${pad(holding.ticker, 8)} ${pad(holding.name ?? '', 32)} ${pad(holding.sector ?? '', 26)} ${holding.weightPercent.toFixed(2)}`,
    );
  }

  const sectors = sectorBreakdown(snapshot.holdings);
  if (sectors.some((row) => row.sector !== UNCLASSIFIED_SECTOR)) {
    lines.push('', rule, 'SECTOR BREAKDOWN:', rule);
    const withValue = sectors.some((row) => row.totalMarketValue !== null);
    lines.push(
      `${pad('Sector', 26)} ${pad('Total_Weight_%', 15)} ${pad('Avg_Weight_%', 13)} ${pad('Count', 6)}${withValue ? ' Total_Market_Value' : ''}`.trimEnd(),
    );
    for (const row of sectors) {
      const value = row.totalMarketValue === null ? '' : ` ${formatUsd(row.totalMarketValue)}`;
      lines.push(
        `${pad(row.sector, 26)} ${pad(row.totalWeight.toFixed(2), 15)} ${pad(row.averageWeight.toFixed(2), 13)} ${pad(String(row.count), 6)}${value}`.trimEnd(),
      );
    }
  }
  lines.push('', rule);
  return lines;
}
