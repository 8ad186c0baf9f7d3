export function sum(values: number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/** Drops absent and non-finite entries. */
export function presentValues(values: Array<number | null>): number[] {
  return values.filter((v): v is number => v !== null && Number.isFinite(v));
}

export function mean(values: number[]): number | null {
  return values.length > 0 ? sum(values) / values.length : null;
}

/**
 * Quantile with linear interpolation between closest ranks
 * (position (n - 1) · p in the sorted series).
 */
export function quantile(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  if (p < 0 || p > 1) throw new RangeError(`quantile p must be within [0, 1], got ${p}`);

  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * p;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const lower = sorted[lo] ?? 0;
  const upper = sorted[hi] ?? lower;
  return lower + (pos - lo) * (upper - lower);
}

export function median(values: number[]): number | null {
  return quantile(values, 0.5);
}

/** Sample standard deviation (n - 1). */
export function sampleStd(values: number[]): number | null {
  const m = mean(values);
  if (m === null || values.length < 2) return null;
  const variance = sum(values.map(v => (v - m) ** 2)) / (values.length - 1);
  return Math.sqrt(variance);
}

/** Pearson correlation; null when either series is constant or shorter than two. */
export function correlation(xs: number[], ys: number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;

  const x = xs.slice(0, n);
  const y = ys.slice(0, n);
  const mx = sum(x) / n;
  const my = sum(y) / n;

  let cov = 0;
  let vx = 0;
  let vy = 0;
  for (let i = 0; i < n; i++) {
    const dx = (x[i] ?? mx) - mx;
    const dy = (y[i] ?? my) - my;
    cov += dx * dy;
    vx += dx * dx;
    vy += dy * dy;
  }

  if (vx === 0 || vy === 0) return null;
  return cov / Math.sqrt(vx * vy);
}
