import { correlation, mean, sampleStd, sum } from './stats.js';
import { TAG_COLUMNS } from '../types/quotes.js';
import type { NormalizedDataset } from '../types/quotes.js';
import type { DatasetSummary, RangeStats } from '../types/metrics.js';

function numericColumn(dataset: NormalizedDataset, column: string): number[] {
  const values: number[] = [];
  for (const row of dataset.rows) {
    const v = row.fields[column];
    if (typeof v === 'number' && Number.isFinite(v)) values.push(v);
  }
  return values;
}

function rangeStats(values: number[]): RangeStats | null {
  const m = mean(values);
  if (m === null) return null;
  return {
    min: values.reduce((a, b) => Math.min(a, b)),
    max: values.reduce((a, b) => Math.max(a, b)),
    mean: m,
    std: sampleStd(values),
  };
}

/** Spot and vol-index close of each date, taken from the first row of that date carrying both. */
function dailyCloses(dataset: NormalizedDataset): { spot: number[]; vol: number[] } {
  const seen = new Map<string, [number, number]>();
  for (const row of dataset.rows) {
    if (seen.has(row.tradeDate)) continue;
    const spot = row.fields['spx_close'];
    const vol = row.fields['vix_close'];
    if (typeof spot === 'number' && typeof vol === 'number') seen.set(row.tradeDate, [spot, vol]);
  }
  const ordered = [...seen.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return { spot: ordered.map(([, [s]]) => s), vol: ordered.map(([, [, v]]) => v) };
}

/** Dataset-level statistics over the normalized table, as read. */
export function summarizeDataset(dataset: NormalizedDataset): DatasetSummary {
  const dates = [...new Set(dataset.rows.map(r => r.tradeDate))].sort();

  const tagColumns = new Set<string>(TAG_COLUMNS);
  const sourceColumns = dataset.columns.filter(c => !tagColumns.has(c));
  const missingValues: Record<string, number> = {};
  for (const column of sourceColumns) {
    missingValues[column] = dataset.rows.filter(r => (r.fields[column] ?? null) === null).length;
  }

  const closes = dailyCloses(dataset);

  return {
    rows: dataset.rows.length,
    tradingDays: dates.length,
    callRows: dataset.rows.filter(r => r.optionSide === 'call').length,
    putRows: dataset.rows.filter(r => r.optionSide === 'put').length,
    unknownSideRows: dataset.rows.filter(r => r.optionSide === 'unknown').length,
    firstDate: dates[0] ?? null,
    lastDate: dates[dates.length - 1] ?? null,
    underlying: rangeStats(numericColumn(dataset, 'spx_close')),
    volIndex: rangeStats(numericColumn(dataset, 'vix_close')),
    totalVolume: sum(numericColumn(dataset, 'volume')),
    totalOpenInterest: sum(numericColumn(dataset, 'openInterest')),
    missingValues,
    underlyingVolIndexCorrelation: correlation(closes.spot, closes.vol),
  };
}
