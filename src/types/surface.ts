import type { DerivedQuote, NumericField, OptionSide } from './quotes.js';

/** Which quote field an axis value is compared against. */
export type AxisKind = 'strike' | 'moneyness' | 'strikeOffset';

export type Tolerance =
  | { mode: 'absolute'; value: number }          // same unit as the axis
  | { mode: 'relativeToSpot'; fraction: number }; // of that date's spot; moneyness axes take it unscaled

export interface AxisDefinition {
  kind: AxisKind;
  values: number[];
  tolerance: Tolerance;
}

export type MetricSelector = NumericField | ((quote: DerivedQuote) => number | null);

export interface SurfaceRequest {
  side: OptionSide;
  metric: MetricSelector;
  metricLabel?: string;
  axis: AxisDefinition;
  /** Keep every n-th date (1 = all). */
  sampleEvery?: number;
  /** Restrict to these dates (YYYY-MM-DD); applied before sampling. */
  dates?: string[];
}

export interface SurfaceGrid {
  side: OptionSide;
  metric: string;
  axisKind: AxisKind;
  dates: string[];
  axis: number[];
  /** values[dateIndex][axisIndex]; null marks a cell with no quote within tolerance. */
  values: Array<Array<number | null>>;
  /** Underlying close per date, copied from that date's quotes. */
  baseline: number[];
}

export type SurfacePreset = 'price' | 'iv' | 'moneyness' | 'spotLevel' | 'strikeOffset' | 'liquidityCost';
