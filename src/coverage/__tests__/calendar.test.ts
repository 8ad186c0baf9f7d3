import { describe, expect, it } from 'vitest';
import { analyzeCoverage, daysBetween, findCoverageGaps, missingWeekdays, monthlyCoverage } from '../calendar.js';

describe('findCoverageGaps', () => {
  it('reports a run longer than the threshold', () => {
    expect(findCoverageGaps(['2025-05-05', '2025-05-22'], 4)).toEqual([
      { dateBefore: '2025-05-05', dateAfter: '2025-05-22', gapDays: 17 },
    ]);
  });

  it('does not report a weekend or a run equal to the threshold', () => {
    expect(findCoverageGaps(['2025-05-09', '2025-05-12', '2025-05-16'], 4)).toEqual([]);
  });

  it('sorts and dedupes dates first', () => {
    expect(findCoverageGaps(['2025-06-20', '2025-06-02', '2025-06-02', '2025-06-03'], 4)).toEqual([
      { dateBefore: '2025-06-03', dateAfter: '2025-06-20', gapDays: 17 },
    ]);
  });

  it('counts calendar days across a month end', () => {
    expect(daysBetween('2025-02-27', '2025-03-03')).toBe(4);
  });
});

describe('monthlyCoverage', () => {
  it('compares observed dates against the expected count', () => {
    const dates = ['2025-04-01', '2025-04-02', '2025-04-02', '2025-05-01'];

    expect(monthlyCoverage(dates, 22)).toEqual([
      { month: '2025-04', observed: 2, expected: 22, shortfall: 20 },
      { month: '2025-05', observed: 1, expected: 22, shortfall: 21 },
    ]);
  });

  it('never reports a negative shortfall', () => {
    expect(monthlyCoverage(['2025-04-01', '2025-04-02'], 1)).toEqual([
      { month: '2025-04', observed: 2, expected: 1, shortfall: 0 },
    ]);
  });

  it('accepts an expectation per month', () => {
    const [april] = monthlyCoverage(['2025-04-01'], month => (month === '2025-04' ? 21 : 22));
    expect(april?.expected).toBe(21);
  });
});

describe('missingWeekdays', () => {
  it('lists weekdays without data and skips weekends', () => {
    expect(missingWeekdays(['2025-05-05', '2025-05-07', '2025-05-09', '2025-05-12'])).toEqual([
      '2025-05-06',
      '2025-05-08',
    ]);
  });

  it('is empty without dates', () => {
    expect(missingWeekdays([])).toEqual([]);
  });
});

describe('analyzeCoverage', () => {
  it('puts the pieces together', () => {
    const report = analyzeCoverage(['2025-05-22', '2025-05-05'], { thresholdDays: 4, expected: 22 });

    expect(report.firstDate).toBe('2025-05-05');
    expect(report.lastDate).toBe('2025-05-22');
    expect(report.tradingDays).toBe(2);
    expect(report.gaps).toHaveLength(1);
    expect(report.months).toEqual([{ month: '2025-05', observed: 2, expected: 22, shortfall: 20 }]);
    expect(report.missingWeekdays).toHaveLength(12);
  });

  it('has no range without dates', () => {
    expect(analyzeCoverage([])).toEqual({
      firstDate: null,
      lastDate: null,
      tradingDays: 0,
      gaps: [],
      months: [],
      missingWeekdays: [],
    });
  });
});
