import 'dotenv/config';
import { config } from './config.js';
import { discoverSources } from './ingest/discovery.js';
import { runAnalysisPipeline } from './pipeline/analysis-pipeline.js';
import { writePipelineOutputs } from './output/table-writer.js';
import { startDashboard } from './dashboard/server.js';
import { describeWarning } from './types/diagnostics.js';
import type { PipelineWarning, WarningCode } from './types/diagnostics.js';
import type { PresetOptions } from './surface/presets.js';

const WARNING_SAMPLE = 5;

function logWarnings(warnings: PipelineWarning[]): void {
  const byCode = new Map<WarningCode, PipelineWarning[]>();
  for (const w of warnings) {
    const bucket = byCode.get(w.code);
    if (bucket) bucket.push(w);
    else byCode.set(w.code, [w]);
  }

  for (const [code, list] of byCode) {
    console.warn(`[Pipeline] ${code}: ${list.length}`);
    for (const w of list.slice(0, WARNING_SAMPLE)) {
      console.warn(`[Pipeline]   ${describeWarning(w)}`);
    }
    if (list.length > WARNING_SAMPLE) {
      console.warn(`[Pipeline]   … ${list.length - WARNING_SAMPLE} more`);
    }
  }
}

async function main(): Promise<void> {
  console.log(`[Boot] odte-surface-pipeline starting (${config.NODE_ENV})`);

  // ── Sources ─────────────────────────────────────────────────────────────
  const paths = discoverSources(config.DATASET_DIR);
  console.log(`[Ingest] Found ${paths.length} CSV file(s) in ${config.DATASET_DIR}`);

  // ── Pipeline ────────────────────────────────────────────────────────────
  const presetOptions: PresetOptions = {
    sampleEvery: config.SURFACE_SAMPLE_EVERY,
    moneynessTolerance: config.MONEYNESS_TOLERANCE,
    priceLevelTolerance: config.PRICE_LEVEL_TOLERANCE,
  };

  const result = runAnalysisPipeline(paths, {
    atmBand: config.ATM_BAND,
    highVolumePercentile: config.HIGH_VOLUME_PERCENTILE,
    gapThresholdDays: config.GAP_THRESHOLD_DAYS,
    expectedTradingDays: config.EXPECTED_TRADING_DAYS_PER_MONTH,
    heatmapBins: config.HEATMAP_BINS,
    presetOptions,
    surfacePresets: [
      { preset: 'price', side: 'call' },
      { preset: 'price', side: 'put' },
      { preset: 'iv', side: 'call' },
      { preset: 'iv', side: 'put' },
      { preset: 'moneyness', side: 'call' },
      { preset: 'spotLevel', side: 'call' },
      { preset: 'strikeOffset', side: 'call' },
      { preset: 'liquidityCost', side: 'call' },
      { preset: 'liquidityCost', side: 'put' },
    ],
  });

  const { summary, liquidity, highVolume, coverage } = result;
  console.log(
    `[Pipeline] Run ${result.runId}: ${summary.rows} rows, ${result.derived.length} derived, ` +
    `${summary.tradingDays} trading days (${summary.firstDate} → ${summary.lastDate})`
  );
  console.log(
    `[Pipeline] Volume ${liquidity.overview.totalVolume.toLocaleString()} | ` +
    `VW liquidity cost ${liquidity.overview.weightedCost?.toFixed(4) ?? 'n/a'} | ` +
    `est. market-maker profit $${Math.round(liquidity.overview.totalMarketMakerProfit).toLocaleString()}`
  );
  console.log(
    `[Pipeline] ${highVolume.days.length} high-volume day(s) above ${highVolume.threshold?.toFixed(0) ?? 'n/a'}; ` +
    `${coverage.gaps.length} coverage gap(s)`
  );
  const averages = result.sideAverages;
  const pct = (iv: number | null): string => (iv === null ? 'n/a' : `${(iv * 100).toFixed(1)}%`);
  console.log(
    `[Pipeline] Avg volume per option: calls ${averages.callMeanVolume?.toFixed(0) ?? 'n/a'}, ` +
    `puts ${averages.putMeanVolume?.toFixed(0) ?? 'n/a'} | avg IV: calls ${pct(averages.callMeanIv)}, ` +
    `puts ${pct(averages.putMeanIv)}`
  );
  logWarnings(result.warnings);

  // ── Output ──────────────────────────────────────────────────────────────
  const files = writePipelineOutputs(config.OUTPUT_DIR, result);
  console.log(`[Output] Wrote ${Object.values(files).join(', ')}`);

  // ── Dashboard (optional read-only API over this run) ────────────────────
  if (!config.SERVE_DASHBOARD) return;
  const server = startDashboard(config.PORT, result, presetOptions);

  const shutdown = (signal: string): void => {
    console.log(`[Boot] ${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
