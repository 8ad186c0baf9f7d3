import { axisKey } from './axis.js';
import type { DerivedQuote } from '../types/quotes.js';
import type { AxisKind, MetricSelector, SurfaceGrid, SurfaceRequest, Tolerance } from '../types/surface.js';

export function resolveMetric(selector: MetricSelector): (quote: DerivedQuote) => number | null {
  return typeof selector === 'function' ? selector : quote => quote[selector];
}

/**
 * Tolerance in the axis' own unit. Moneyness is already a fraction of spot, so a
 * relative tolerance applies to it as is; price-like axes scale it by spot.
 */
export function toleranceFor(tolerance: Tolerance, spot: number, kind: AxisKind): number {
  if (tolerance.mode === 'absolute') return tolerance.value;
  return kind === 'moneyness' ? tolerance.fraction : tolerance.fraction * spot;
}

/**
 * Quote whose axis key is closest to `target`. Ties keep the earliest quote in
 * input order. Returns null when no quote has a finite key.
 */
export function nearestQuote(
  quotes: DerivedQuote[],
  kind: AxisKind,
  target: number
): { quote: DerivedQuote; distance: number } | null {
  let best: { quote: DerivedQuote; distance: number } | null = null;
  for (const quote of quotes) {
    const key = axisKey(quote, kind);
    if (!Number.isFinite(key)) continue;
    const distance = Math.abs(key - target);
    if (best === null || distance < best.distance) {
      best = { quote, distance };
    }
  }
  return best;
}

function selectDates(all: string[], request: SurfaceRequest): string[] {
  const every = request.sampleEvery ?? 1;
  if (!Number.isInteger(every) || every < 1) {
    throw new RangeError(`sampleEvery must be a positive integer, got ${every}`);
  }
  const wanted = request.dates ? new Set(request.dates) : null;
  return all.filter(d => wanted === null || wanted.has(d)).filter((_, i) => i % every === 0);
}

/**
 * Dense (date × axis value) grid of one metric for one side. Each cell takes the
 * metric of the nearest quote of that date when it lies strictly closer than the
 * tolerance, and null otherwise. The baseline is each date's underlying close as quoted.
 */
export function buildSurfaceGrid(quotes: DerivedQuote[], request: SurfaceRequest): SurfaceGrid {
  const metric = resolveMetric(request.metric);
  const { kind, tolerance } = request.axis;
  const axis = [...request.axis.values];

  const byDate = new Map<string, DerivedQuote[]>();
  for (const q of quotes) {
    if (q.optionSide !== request.side) continue;
    const bucket = byDate.get(q.tradeDate);
    if (bucket) bucket.push(q);
    else byDate.set(q.tradeDate, [q]);
  }

  const dates: string[] = [];
  const values: Array<Array<number | null>> = [];
  const baseline: number[] = [];

  for (const date of selectDates([...byDate.keys()].sort(), request)) {
    const dayQuotes = byDate.get(date);
    const first = dayQuotes?.[0];
    if (!dayQuotes || !first) continue;

    const maxDistance = toleranceFor(tolerance, first.underlyingClose, kind);
    const row = axis.map(target => {
      const match = nearestQuote(dayQuotes, kind, target);
      if (!match || match.distance >= maxDistance) return null;
      const value = metric(match.quote);
      return value !== null && Number.isFinite(value) ? value : null;
    });

    dates.push(date);
    values.push(row);
    baseline.push(first.underlyingClose);
  }

  return {
    side: request.side,
    metric: request.metricLabel ?? (typeof request.metric === 'string' ? request.metric : 'custom'),
    axisKind: kind,
    dates,
    axis,
    values,
    baseline,
  };
}
