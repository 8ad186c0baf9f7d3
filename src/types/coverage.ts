export interface CoverageGap {
  dateBefore: string;
  dateAfter: string;
  gapDays: number;          // calendar days between the two observed dates
}

export interface MonthlyCoverage {
  month: string;            // YYYY-MM
  observed: number;
  expected: number;
  shortfall: number;        // expected - observed, never below 0
}

export interface CoverageReport {
  firstDate: string | null;
  lastDate: string | null;
  tradingDays: number;
  gaps: CoverageGap[];
  months: MonthlyCoverage[];
  missingWeekdays: string[];
}
