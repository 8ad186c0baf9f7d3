import { CONTRACT_MULTIPLIER } from './derive.js';
import { mean, median, sum } from './stats.js';
import type { DerivedQuote, NumericField } from '../types/quotes.js';
import type { GroupDimension, LiquidityGroupKey, LiquidityOverview, LiquiditySummary } from '../types/metrics.js';
import type { PipelineWarning, StageResult } from '../types/diagnostics.js';

/** Missing volume counts as zero, here and only here. */
export function volumeOf(quote: DerivedQuote): number {
  return quote.volume ?? 0;
}

/**
 * Σ(metric · volume) / Σ(volume) over quotes whose metric is present.
 * Undefined (null) when that volume sums to zero.
 */
export function volumeWeightedAverage(
  quotes: DerivedQuote[],
  metric: NumericField = 'effectiveLiquidityCost'
): number | null {
  let weighted = 0;
  let volume = 0;
  for (const q of quotes) {
    const value = q[metric];
    if (value === null || !Number.isFinite(value)) continue;
    weighted += value * volumeOf(q);
    volume += volumeOf(q);
  }
  return volume > 0 ? weighted / volume : null;
}

export function totalMarketMakerProfit(quotes: DerivedQuote[], multiplier = CONTRACT_MULTIPLIER): number {
  return sum(quotes.map(q => q.effectiveLiquidityCost * volumeOf(q) * multiplier));
}

export function liquidityOverview(quotes: DerivedQuote[]): LiquidityOverview {
  return {
    totalVolume: sum(quotes.map(volumeOf)),
    weightedCost: volumeWeightedAverage(quotes),
    totalMarketMakerProfit: totalMarketMakerProfit(quotes),
  };
}

function groupKeyOf(quote: DerivedQuote, dimensions: GroupDimension[]): LiquidityGroupKey {
  const key: LiquidityGroupKey = {};
  for (const dim of dimensions) {
    if (dim === 'tradeDate') key.tradeDate = quote.tradeDate;
    else if (dim === 'optionSide') key.optionSide = quote.optionSide;
    else key.moneynessCategory = quote.moneynessCategory;
  }
  return key;
}

export function formatGroupKey(key: LiquidityGroupKey, dimensions: GroupDimension[]): string {
  if (dimensions.length === 0) return 'all';
  return dimensions.map(dim => key[dim] ?? '').join('|');
}

function compareKeys(a: LiquidityGroupKey, b: LiquidityGroupKey, dimensions: GroupDimension[]): number {
  for (const dim of dimensions) {
    const x = a[dim] ?? '';
    const y = b[dim] ?? '';
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}

/**
 * Liquidity-cost summary per group of the given dimensions, sorted by key.
 * No dimensions gives one group over everything.
 */
export function summarizeLiquidity(
  quotes: DerivedQuote[],
  dimensions: GroupDimension[] = []
): StageResult<LiquiditySummary[]> {
  const groups = new Map<string, { key: LiquidityGroupKey; quotes: DerivedQuote[] }>();
  for (const q of quotes) {
    const key = groupKeyOf(q, dimensions);
    const id = formatGroupKey(key, dimensions);
    const group = groups.get(id);
    if (group) group.quotes.push(q);
    else groups.set(id, { key, quotes: [q] });
  }

  const warnings: PipelineWarning[] = [];
  const summaries = [...groups.entries()]
    .sort(([, a], [, b]) => compareKeys(a.key, b.key, dimensions))
    .map(([id, { key, quotes: members }]): LiquiditySummary => {
      const costs = members.map(q => q.effectiveLiquidityCost);
      const weightedCost = volumeWeightedAverage(members);
      if (weightedCost === null) {
        warnings.push({ code: 'UNDEFINED_AGGREGATE', group: id, metric: 'effectiveLiquidityCost' });
      }
      return {
        key,
        count: members.length,
        totalVolume: sum(members.map(volumeOf)),
        meanCost: mean(costs) ?? 0,
        medianCost: median(costs) ?? 0,
        weightedCost,
        meanItmDiscount: mean(members.map(q => q.itmDiscount)) ?? 0,
        meanSpreadCost: mean(members.map(q => q.spreadCost)) ?? 0,
        marketMakerProfit: totalMarketMakerProfit(members),
      };
    });

  return { value: summaries, warnings };
}
