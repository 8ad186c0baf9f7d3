import { volumeOf } from './aggregates.js';
import { quantile } from './stats.js';
import type { DerivedQuote } from '../types/quotes.js';
import type { DailyVolume, HighVolumeDay, HighVolumeReport } from '../types/metrics.js';

export const DEFAULT_HIGH_VOLUME_PERCENTILE = 0.9;

/** Total traded volume per trade date (both sides), in date order. */
export function dailyVolumes(quotes: DerivedQuote[]): DailyVolume[] {
  const totals = new Map<string, number>();
  for (const q of quotes) {
    totals.set(q.tradeDate, (totals.get(q.tradeDate) ?? 0) + volumeOf(q));
  }
  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([tradeDate, volume]) => ({ tradeDate, volume }));
}

/**
 * Dates whose total volume is strictly above the given percentile of all daily
 * totals, busiest first.
 */
export function findHighVolumeDays(
  quotes: DerivedQuote[],
  percentile = DEFAULT_HIGH_VOLUME_PERCENTILE
): HighVolumeReport {
  const daily = dailyVolumes(quotes);
  const threshold = quantile(daily.map(d => d.volume), percentile);
  if (threshold === null) return { percentile, threshold, days: [] };

  const firstQuote = new Map<string, DerivedQuote>();
  for (const q of quotes) {
    if (!firstQuote.has(q.tradeDate)) firstQuote.set(q.tradeDate, q);
  }

  const days: HighVolumeDay[] = [];
  for (const d of daily) {
    const q = firstQuote.get(d.tradeDate);
    if (d.volume > threshold && q) {
      days.push({ ...d, underlyingClose: q.underlyingClose, volIndexClose: q.volIndexClose });
    }
  }
  days.sort((a, b) => b.volume - a.volume);

  return { percentile, threshold, days };
}
