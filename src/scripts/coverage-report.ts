/**
 * Print trading-day coverage of the dataset: gaps, per-month counts, missing weekdays.
 * Run with: npx tsx src/scripts/coverage-report.ts
 */
import 'dotenv/config';
import { config } from '../config.js';
import { discoverSources } from '../ingest/discovery.js';
import { ingestSources } from '../ingest/normalizer.js';
import { analyzeCoverage } from '../coverage/calendar.js';
import { describeWarning } from '../types/diagnostics.js';

function report(): void {
  const ingestion = ingestSources(discoverSources(config.DATASET_DIR));
  for (const w of ingestion.warnings) {
    console.warn(`[Ingest] ${describeWarning(w)}`);
  }

  const coverage = analyzeCoverage(
    ingestion.value.rows.map(r => r.tradeDate),
    { thresholdDays: config.GAP_THRESHOLD_DAYS, expected: config.EXPECTED_TRADING_DAYS_PER_MONTH }
  );

  console.log(`Date range: ${coverage.firstDate} to ${coverage.lastDate} (${coverage.tradingDays} trading days)`);

  console.log(`\nGaps longer than ${config.GAP_THRESHOLD_DAYS} days: ${coverage.gaps.length}`);
  for (const gap of coverage.gaps) {
    console.log(`  ${gap.gapDays} days between ${gap.dateBefore} and ${gap.dateAfter}`);
  }

  console.log('\nMonth     observed  expected  shortfall');
  for (const m of coverage.months) {
    console.log(`${m.month}   ${String(m.observed).padStart(8)}  ${String(m.expected).padStart(8)}  ${String(m.shortfall).padStart(9)}`);
  }

  console.log(`\nWeekdays without data: ${coverage.missingWeekdays.length}`);
  if (coverage.missingWeekdays.length > 0) {
    console.log(`  ${coverage.missingWeekdays.join(', ')}`);
  }
}

try {
  report();
} catch (err) {
  console.error(err);
  process.exit(1);
}
