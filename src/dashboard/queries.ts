import { z } from 'zod';
import { summarizeLiquidity } from '../metrics/aggregates.js';
import { buildPresetSurface, isSurfacePreset, SURFACE_PRESETS } from '../surface/presets.js';
import type { PipelineResult } from '../pipeline/analysis-pipeline.js';
import type { PresetOptions } from '../surface/presets.js';
import type { PipelineWarning } from '../types/diagnostics.js';
import type { GroupDimension, LiquiditySummary } from '../types/metrics.js';
import type { SurfaceGrid } from '../types/surface.js';

export type QueryResult<T> = { ok: true; data: T } | { ok: false; status: number; error: string };

const dimensionSchema = z.enum(['tradeDate', 'optionSide', 'moneynessCategory']);

const liquidityQuerySchema = z.object({
  groupBy: z
    .string()
    .optional()
    .transform(v => (v ? v.split(',').map(s => s.trim()).filter(Boolean) : []))
    .pipe(z.array(dimensionSchema)),
});

const surfaceQuerySchema = z.object({
  preset: z.string().min(1),
  side: z.enum(['call', 'put']).default('call'),
  sampleEvery: z.coerce.number().int().positive().optional(),
});

const warningsQuerySchema = z.object({
  code: z
    .enum([
      'SOURCE_PARSE_ERROR',
      'UNKNOWN_SIDE',
      'MISSING_FIELD',
      'INVALID_ROW',
      'DUPLICATE_KEY',
      'UNDEFINED_AGGREGATE',
      'ITM_FLAG_MISMATCH',
    ])
    .optional(),
  limit: z.coerce.number().int().min(1).max(5000).default(500),
});

function invalid(error: z.ZodError): { ok: false; status: number; error: string } {
  return { ok: false, status: 400, error: error.errors.map(e => `${e.path.join('.') || 'query'}: ${e.message}`).join('; ') };
}

export function queryLiquidity(result: PipelineResult, query: unknown): QueryResult<{ groupBy: GroupDimension[]; groups: LiquiditySummary[] }> {
  const parsed = liquidityQuerySchema.safeParse(query);
  if (!parsed.success) return invalid(parsed.error);
  const groupBy = parsed.data.groupBy;
  return { ok: true, data: { groupBy, groups: summarizeLiquidity(result.derived, groupBy).value } };
}

export function querySurface(
  result: PipelineResult,
  params: unknown,
  defaults: PresetOptions = {}
): QueryResult<SurfaceGrid> {
  const parsed = surfaceQuerySchema.safeParse(params);
  if (!parsed.success) return invalid(parsed.error);

  const { preset, side, sampleEvery } = parsed.data;
  if (!isSurfacePreset(preset)) {
    return { ok: false, status: 404, error: `Unknown surface preset: ${preset} (expected one of ${SURFACE_PRESETS.join(', ')})` };
  }

  return {
    ok: true,
    data: buildPresetSurface(result.derived, preset, side, { ...defaults, sampleEvery: sampleEvery ?? defaults.sampleEvery }),
  };
}

export function queryWarnings(result: PipelineResult, query: unknown): QueryResult<{ total: number; warnings: PipelineWarning[] }> {
  const parsed = warningsQuerySchema.safeParse(query);
  if (!parsed.success) return invalid(parsed.error);

  const { code, limit } = parsed.data;
  const matching = code ? result.warnings.filter(w => w.code === code) : result.warnings;
  return { ok: true, data: { total: matching.length, warnings: matching.slice(0, limit) } };
}
