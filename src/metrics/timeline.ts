import { dailyVolumes } from './high-volume.js';
import { mean, presentValues } from './stats.js';
import type { DerivedQuote, OptionSide } from '../types/quotes.js';
import type { DailyTimelinePoint, IvHeatmap, SideAverages } from '../types/metrics.js';

export const DEFAULT_HEATMAP_BINS = 20;

/** Spot close, vol-index close and total volume of each date, in date order. */
export function dailyTimeline(quotes: DerivedQuote[]): DailyTimelinePoint[] {
  const firstQuote = new Map<string, DerivedQuote>();
  for (const q of quotes) {
    if (!firstQuote.has(q.tradeDate)) firstQuote.set(q.tradeDate, q);
  }

  const points: DailyTimelinePoint[] = [];
  for (const { tradeDate, volume } of dailyVolumes(quotes)) {
    const q = firstQuote.get(tradeDate);
    if (q) {
      points.push({ tradeDate, underlyingClose: q.underlyingClose, volIndexClose: q.volIndexClose, totalVolume: volume });
    }
  }
  return points;
}

/**
 * Equal-width edges over [min, max]. A single value gets a range of ±0.1% around
 * it (±0.001 at zero).
 */
export function equalWidthEdges(min: number, max: number, bins: number): number[] {
  let lo = min;
  let hi = max;
  if (lo === hi) {
    const pad = lo === 0 ? 0.001 : Math.abs(lo) * 0.001;
    lo -= pad;
    hi += pad;
  }
  const width = (hi - lo) / bins;
  const edges = Array.from({ length: bins }, (_, i) => lo + i * width);
  edges.push(hi);
  return edges;
}

/** Bin of a value under right-closed bins; the lowest edge belongs to the first bin. */
export function binIndex(edges: number[], value: number): number {
  const last = edges.length - 2;
  for (let i = 0; i < last; i++) {
    if (value <= (edges[i + 1] ?? Infinity)) return i;
  }
  return last;
}

/**
 * Mean IV per trade date and moneyness bin, over both sides. Bins split the
 * observed moneyness range into `bins` equal widths.
 */
export function ivMoneynessHeatmap(quotes: DerivedQuote[], bins = DEFAULT_HEATMAP_BINS): IvHeatmap {
  if (!Number.isInteger(bins) || bins < 1) throw new RangeError(`bins must be a positive integer, got ${bins}`);

  const binned = quotes.filter(q => Number.isFinite(q.moneyness));
  if (binned.length === 0) return { edges: [], dates: [], values: [] };

  const min = binned.reduce((a, q) => Math.min(a, q.moneyness), Infinity);
  const max = binned.reduce((a, q) => Math.max(a, q.moneyness), -Infinity);
  const edges = equalWidthEdges(min, max, bins);

  const dates = [...new Set(binned.map(q => q.tradeDate))].sort();
  const row = new Map(dates.map((d, i): [string, number] => [d, i]));
  const cells = dates.map(() => Array.from({ length: bins }, (): number[] => []));

  for (const q of binned) {
    const i = row.get(q.tradeDate);
    if (i === undefined || q.impliedVolatility === null || !Number.isFinite(q.impliedVolatility)) continue;
    cells[i]?.[binIndex(edges, q.moneyness)]?.push(q.impliedVolatility);
  }

  return { edges, dates, values: cells.map(r => r.map(mean)) };
}

function sideMeans(quotes: DerivedQuote[], side: OptionSide) {
  const own = quotes.filter(q => q.optionSide === side);
  return {
    volume: mean(presentValues(own.map(q => q.volume))),
    iv: mean(presentValues(own.map(q => q.impliedVolatility))),
  };
}

/** Average volume per quote and average IV of each side, over the whole dataset. */
export function sideAverages(quotes: DerivedQuote[]): SideAverages {
  const calls = sideMeans(quotes, 'call');
  const puts = sideMeans(quotes, 'put');
  return { callMeanVolume: calls.volume, putMeanVolume: puts.volume, callMeanIv: calls.iv, putMeanIv: puts.iv };
}
