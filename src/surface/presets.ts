import { distinctAxisValues, linspace, spotRangeAxis } from './axis.js';
import { buildSurfaceGrid } from './grid-builder.js';
import type { DerivedQuote, OptionSide } from '../types/quotes.js';
import type { SurfaceGrid, SurfacePreset, SurfaceRequest } from '../types/surface.js';

export const SURFACE_PRESETS: readonly SurfacePreset[] = [
  'price',
  'iv',
  'moneyness',
  'spotLevel',
  'strikeOffset',
  'liquidityCost',
];

export interface PresetOptions {
  sampleEvery?: number;
  dates?: string[];
  /** Moneyness units; 0.005 = 0.5% of spot. */
  moneynessTolerance?: number;
  /** Dollars, for axes laid over price levels. */
  priceLevelTolerance?: number;
}

/** Dollars; strikes sit on whole-dollar increments, so this only admits an exact strike. */
export const EXACT_STRIKE_TOLERANCE = 0.01;

const spotPlusPremium = (q: DerivedQuote): number => q.underlyingClose + q.lastPrice;

export function isSurfacePreset(value: string): value is SurfacePreset {
  return SURFACE_PRESETS.some(p => p === value);
}

/** Request for one of the standard surfaces, with its axis laid over the side's quotes. */
export function presetRequest(
  preset: SurfacePreset,
  side: OptionSide,
  quotes: DerivedQuote[],
  options: PresetOptions = {}
): SurfaceRequest {
  const sideQuotes = quotes.filter(q => q.optionSide === side);
  const moneynessTolerance = options.moneynessTolerance ?? 0.005;
  const priceLevelTolerance = options.priceLevelTolerance ?? 10;
  const base = { side, sampleEvery: options.sampleEvery, dates: options.dates };

  switch (preset) {
    case 'price':
      return {
        ...base,
        metric: 'lastPrice',
        axis: { kind: 'strike', values: distinctAxisValues(sideQuotes, 'strike'), tolerance: { mode: 'absolute', value: EXACT_STRIKE_TOLERANCE } },
      };
    case 'iv':
      return {
        ...base,
        metric: 'impliedVolatility',
        axis: { kind: 'strike', values: distinctAxisValues(sideQuotes, 'strike'), tolerance: { mode: 'absolute', value: EXACT_STRIKE_TOLERANCE } },
      };
    case 'moneyness':
      return {
        ...base,
        metric: 'lastPrice',
        axis: {
          kind: 'moneyness',
          values: distinctAxisValues(sideQuotes, 'moneyness', { min: -0.1, max: 0.1 }),
          tolerance: { mode: 'absolute', value: moneynessTolerance },
        },
      };
    case 'spotLevel':
      return {
        ...base,
        metric: spotPlusPremium,
        metricLabel: 'spotPlusPremium',
        axis: { kind: 'strike', values: spotRangeAxis(sideQuotes, 50, 0.05), tolerance: { mode: 'absolute', value: priceLevelTolerance } },
      };
    case 'strikeOffset':
      return {
        ...base,
        metric: spotPlusPremium,
        metricLabel: 'spotPlusPremium',
        axis: { kind: 'strikeOffset', values: linspace(-200, 200, 41), tolerance: { mode: 'absolute', value: priceLevelTolerance } },
      };
    case 'liquidityCost':
      return {
        ...base,
        metric: 'effectiveLiquidityCost',
        axis: { kind: 'moneyness', values: linspace(-0.05, 0.05, 21), tolerance: { mode: 'absolute', value: moneynessTolerance } },
      };
  }
}

export function buildPresetSurface(
  quotes: DerivedQuote[],
  preset: SurfacePreset,
  side: OptionSide,
  options: PresetOptions = {}
): SurfaceGrid {
  return buildSurfaceGrid(quotes, presetRequest(preset, side, quotes, options));
}
