import type { DerivedQuote } from '../types/quotes.js';
import type { AxisKind } from '../types/surface.js';

/** `count` evenly spaced values from start to stop, both included. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step));
}

/** The quote field an axis of this kind is matched against. */
export function axisKey(quote: DerivedQuote, kind: AxisKind): number {
  switch (kind) {
    case 'strike':
      return quote.strike;
    case 'moneyness':
      return quote.moneyness;
    case 'strikeOffset':
      return quote.strikeOffset;
  }
}

/** Sorted distinct key values, optionally kept to [min, max]. */
export function distinctAxisValues(
  quotes: DerivedQuote[],
  kind: AxisKind,
  range?: { min: number; max: number }
): number[] {
  const values = new Set<number>();
  for (const q of quotes) {
    const v = axisKey(q, kind);
    if (!Number.isFinite(v)) continue;
    if (range && (v < range.min || v > range.max)) continue;
    values.add(v);
  }
  return [...values].sort((a, b) => a - b);
}

/** Evenly spaced price levels across the spot range, widened by `padding` on each side. */
export function spotRangeAxis(quotes: DerivedQuote[], points = 50, padding = 0.05): number[] {
  if (quotes.length === 0) return [];
  let min = Infinity;
  let max = -Infinity;
  for (const q of quotes) {
    min = Math.min(min, q.underlyingClose);
    max = Math.max(max, q.underlyingClose);
  }
  return linspace(min * (1 - padding), max * (1 + padding), points);
}
