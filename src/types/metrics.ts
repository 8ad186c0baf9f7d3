import type { MoneynessCategory, OptionSide } from './quotes.js';

export type GroupDimension = 'tradeDate' | 'optionSide' | 'moneynessCategory';

export interface LiquidityGroupKey {
  tradeDate?: string;
  optionSide?: OptionSide;
  moneynessCategory?: MoneynessCategory;
}

export interface LiquiditySummary {
  key: LiquidityGroupKey;
  count: number;
  totalVolume: number;
  meanCost: number;
  medianCost: number;
  weightedCost: number | null;      // null when the group traded no volume
  meanItmDiscount: number;
  meanSpreadCost: number;
  marketMakerProfit: number;        // Σ cost × volume × multiplier
}

export interface DailyVolume {
  tradeDate: string;
  volume: number;
}

export interface HighVolumeDay extends DailyVolume {
  underlyingClose: number;
  volIndexClose: number | null;
}

export interface HighVolumeReport {
  percentile: number;
  threshold: number | null;         // null when there are no dates
  days: HighVolumeDay[];            // volume descending
}

export interface DailyFlow {
  tradeDate: string;
  callVolume: number;
  putVolume: number;
  callOpenInterest: number;
  putOpenInterest: number;
  callMeanIv: number | null;
  putMeanIv: number | null;
  callMeanSpread: number | null;
  putMeanSpread: number | null;
  putCallRatio: number | null;      // null when no call volume
}

export interface ItmOtmBucket {
  optionSide: OptionSide;
  inTheMoney: boolean | null;       // as recorded by the source
  count: number;
  volumeSum: number;
  volumeMean: number;
  meanIv: number | null;
}

export interface RangeStats {
  min: number;
  max: number;
  mean: number;
  std: number | null;               // sample std; null below two observations
}

export interface DatasetSummary {
  rows: number;
  tradingDays: number;
  callRows: number;
  putRows: number;
  unknownSideRows: number;
  firstDate: string | null;
  lastDate: string | null;
  underlying: RangeStats | null;
  volIndex: RangeStats | null;
  totalVolume: number;
  totalOpenInterest: number;
  missingValues: Record<string, number>;
  underlyingVolIndexCorrelation: number | null;
}

export interface LiquidityOverview {
  totalVolume: number;
  weightedCost: number | null;
  totalMarketMakerProfit: number;
}

export interface DailyTimelinePoint {
  tradeDate: string;
  underlyingClose: number;
  volIndexClose: number | null;
  totalVolume: number;
}

export interface IvHeatmap {
  edges: number[];                  // bins + 1 moneyness edges; each bin is (edge, next edge]
  dates: string[];
  values: Array<Array<number | null>>; // [date][bin] mean IV; null when the cell has no IV
}

export interface SideAverages {
  callMeanVolume: number | null;    // per quote with a recorded volume
  putMeanVolume: number | null;
  callMeanIv: number | null;
  putMeanIv: number | null;
}
