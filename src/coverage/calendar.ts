import type { CoverageGap, CoverageReport, MonthlyCoverage } from '../types/coverage.js';

const DAY_MS = 86_400_000;

export const DEFAULT_GAP_THRESHOLD_DAYS = 4;
export const DEFAULT_EXPECTED_TRADING_DAYS = 22;

export type ExpectedDays = number | ((month: string) => number);

function toUtcMs(date: string): number {
  return Date.parse(`${date}T00:00:00Z`);
}

function toIsoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

function distinctSorted(dates: string[]): string[] {
  return [...new Set(dates)].sort();
}

/** Runs between successive observed dates longer than `thresholdDays` calendar days. */
export function findCoverageGaps(dates: string[], thresholdDays = DEFAULT_GAP_THRESHOLD_DAYS): CoverageGap[] {
  const sorted = distinctSorted(dates);
  const gaps: CoverageGap[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const dateBefore = sorted[i - 1];
    const dateAfter = sorted[i];
    if (dateBefore === undefined || dateAfter === undefined) continue;
    const gapDays = daysBetween(dateBefore, dateAfter);
    if (gapDays > thresholdDays) gaps.push({ dateBefore, dateAfter, gapDays });
  }
  return gaps;
}

/**
 * Observed trading dates per month against an expected count. The expectation
 * is a caller assumption (roughly 22 sessions a month), not derived from data.
 */
export function monthlyCoverage(
  dates: string[],
  expected: ExpectedDays = DEFAULT_EXPECTED_TRADING_DAYS
): MonthlyCoverage[] {
  const counts = new Map<string, number>();
  for (const date of distinctSorted(dates)) {
    const month = date.slice(0, 7);
    counts.set(month, (counts.get(month) ?? 0) + 1);
  }

  return [...counts.entries()].map(([month, observed]) => {
    const want = typeof expected === 'number' ? expected : expected(month);
    return { month, observed, expected: want, shortfall: Math.max(want - observed, 0) };
  });
}

/** Monday–Friday dates between the first and last observation with no data. Holidays are not known here. */
export function missingWeekdays(dates: string[]): string[] {
  const sorted = distinctSorted(dates);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (first === undefined || last === undefined) return [];

  const observed = new Set(sorted);
  const missing: string[] = [];
  for (let ms = toUtcMs(first); ms <= toUtcMs(last); ms += DAY_MS) {
    const weekday = new Date(ms).getUTCDay();
    const date = toIsoDate(ms);
    if (weekday >= 1 && weekday <= 5 && !observed.has(date)) missing.push(date);
  }
  return missing;
}

export interface CoverageOptions {
  thresholdDays?: number;
  expected?: ExpectedDays;
}

export function analyzeCoverage(dates: string[], options: CoverageOptions = {}): CoverageReport {
  const sorted = distinctSorted(dates);
  return {
    firstDate: sorted[0] ?? null,
    lastDate: sorted[sorted.length - 1] ?? null,
    tradingDays: sorted.length,
    gaps: findCoverageGaps(sorted, options.thresholdDays),
    months: monthlyCoverage(sorted, options.expected),
    missingWeekdays: missingWeekdays(sorted),
  };
}
