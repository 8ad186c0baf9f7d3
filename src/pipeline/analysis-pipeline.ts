import { v4 as uuidv4 } from 'uuid';
import { ingestSources } from '../ingest/normalizer.js';
import { findDuplicateKeys } from '../ingest/duplicates.js';
import { deriveDataset } from '../metrics/derive.js';
import { liquidityOverview, summarizeLiquidity } from '../metrics/aggregates.js';
import { findHighVolumeDays } from '../metrics/high-volume.js';
import { dailyFlow, itmOtmBreakdown } from '../metrics/flow.js';
import { summarizeDataset } from '../metrics/summary.js';
import { dailyTimeline, ivMoneynessHeatmap, sideAverages } from '../metrics/timeline.js';
import { analyzeCoverage } from '../coverage/calendar.js';
import { buildSurfaceGrid } from '../surface/grid-builder.js';
import { buildPresetSurface } from '../surface/presets.js';
import type { IngestOptions } from '../ingest/normalizer.js';
import type { ExpectedDays } from '../coverage/calendar.js';
import type { PresetOptions } from '../surface/presets.js';
import type { DerivedQuote, NormalizedDataset, OptionSide } from '../types/quotes.js';
import type { PipelineWarning } from '../types/diagnostics.js';
import type {
  DailyFlow,
  DailyTimelinePoint,
  DatasetSummary,
  GroupDimension,
  HighVolumeReport,
  ItmOtmBucket,
  IvHeatmap,
  LiquidityOverview,
  LiquiditySummary,
  SideAverages,
} from '../types/metrics.js';
import type { CoverageReport } from '../types/coverage.js';
import type { SurfaceGrid, SurfacePreset, SurfaceRequest } from '../types/surface.js';

export interface PipelineOptions extends IngestOptions {
  atmBand?: number;
  highVolumePercentile?: number;
  gapThresholdDays?: number;
  expectedTradingDays?: ExpectedDays;
  /** Moneyness bins of the IV heatmap. */
  heatmapBins?: number;
  /** Standard surfaces to build, keyed `${preset}:${side}` in the result. */
  surfacePresets?: Array<{ preset: SurfacePreset; side: OptionSide }>;
  presetOptions?: PresetOptions;
  /** Caller-defined surfaces, keyed by name in the result. */
  surfaces?: Array<{ name: string; request: SurfaceRequest }>;
}

export interface LiquidityBreakdown {
  overview: LiquidityOverview;
  bySide: LiquiditySummary[];
  bySideAndCategory: LiquiditySummary[];
  byDateAndSide: LiquiditySummary[];
  byDateSideAndCategory: LiquiditySummary[];
}

export interface PipelineResult {
  runId: string;
  normalized: NormalizedDataset;
  derived: DerivedQuote[];
  liquidity: LiquidityBreakdown;
  highVolume: HighVolumeReport;
  flow: DailyFlow[];
  itmOtm: ItmOtmBucket[];
  timeline: DailyTimelinePoint[];
  ivHeatmap: IvHeatmap;
  sideAverages: SideAverages;
  summary: DatasetSummary;
  coverage: CoverageReport;
  surfaces: Record<string, SurfaceGrid>;
  warnings: PipelineWarning[];
}

const LIQUIDITY_GROUPINGS: Record<Exclude<keyof LiquidityBreakdown, 'overview'>, GroupDimension[]> = {
  bySide: ['optionSide'],
  bySideAndCategory: ['optionSide', 'moneynessCategory'],
  byDateAndSide: ['tradeDate', 'optionSide'],
  byDateSideAndCategory: ['tradeDate', 'optionSide', 'moneynessCategory'],
};

/**
 * Everything after ingestion: derive metrics, aggregate, analyse coverage and
 * build the requested surfaces. Each stage's output is produced once and only read afterwards.
 */
export function analyzeDataset(
  normalized: NormalizedDataset,
  options: PipelineOptions = {},
  priorWarnings: PipelineWarning[] = []
): PipelineResult {
  const warnings: PipelineWarning[] = [...priorWarnings];

  // ── Phase 1: Audit ────────────────────────────────────────────────────────
  warnings.push(...findDuplicateKeys(normalized));

  // ── Phase 2: Per-quote metrics ────────────────────────────────────────────
  const derivation = deriveDataset(normalized, { atmBand: options.atmBand });
  warnings.push(...derivation.warnings);
  const derived = derivation.value;

  // ── Phase 3: Aggregates (after every row is derived) ──────────────────────
  const grouped = (dimensions: GroupDimension[]): LiquiditySummary[] => {
    const result = summarizeLiquidity(derived, dimensions);
    warnings.push(...result.warnings);
    return result.value;
  };
  const liquidity: LiquidityBreakdown = {
    overview: liquidityOverview(derived),
    bySide: grouped(LIQUIDITY_GROUPINGS.bySide),
    bySideAndCategory: grouped(LIQUIDITY_GROUPINGS.bySideAndCategory),
    byDateAndSide: grouped(LIQUIDITY_GROUPINGS.byDateAndSide),
    byDateSideAndCategory: grouped(LIQUIDITY_GROUPINGS.byDateSideAndCategory),
  };

  // ── Phase 4: Coverage (normalized dates, independent of derivation) ───────
  const coverage = analyzeCoverage(
    normalized.rows.map(r => r.tradeDate),
    { thresholdDays: options.gapThresholdDays, expected: options.expectedTradingDays }
  );

  // ── Phase 5: Surfaces ─────────────────────────────────────────────────────
  const surfaces: Record<string, SurfaceGrid> = {};
  for (const { preset, side } of options.surfacePresets ?? []) {
    surfaces[`${preset}:${side}`] = buildPresetSurface(derived, preset, side, options.presetOptions);
  }
  for (const { name, request } of options.surfaces ?? []) {
    surfaces[name] = buildSurfaceGrid(derived, request);
  }

  return {
    runId: uuidv4(),
    normalized,
    derived,
    liquidity,
    highVolume: findHighVolumeDays(derived, options.highVolumePercentile),
    flow: dailyFlow(derived),
    itmOtm: itmOtmBreakdown(derived),
    timeline: dailyTimeline(derived),
    ivHeatmap: ivMoneynessHeatmap(derived, options.heatmapBins),
    sideAverages: sideAverages(derived),
    summary: summarizeDataset(normalized),
    coverage,
    surfaces,
    warnings,
  };
}

/**
 * Full batch run over a set of source files. Throws EmptyDatasetError when no
 * source could be ingested; every other problem comes back in `warnings`.
 */
export function runAnalysisPipeline(paths: string[], options: PipelineOptions = {}): PipelineResult {
  const ingestion = ingestSources(paths, { readSource: options.readSource });
  return analyzeDataset(ingestion.value, options, ingestion.warnings);
}
