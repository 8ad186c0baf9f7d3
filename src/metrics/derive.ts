import { missingColumns, toOptionQuote } from './quote-schema.js';
import type { DerivedQuote, MoneynessCategory, NormalizedDataset, OptionQuote, OptionSide } from '../types/quotes.js';
import type { PipelineWarning, StageResult } from '../types/diagnostics.js';

/** Index option contract multiplier. */
export const CONTRACT_MULTIPLIER = 100;

/** |moneyness| below this band is at-the-money (0.5% of spot). */
export const DEFAULT_ATM_BAND = 0.005;

export interface DeriveOptions {
  atmBand?: number;
}

export function computeMoneyness(strike: number, spot: number): number {
  return (strike - spot) / spot;
}

export function intrinsicValue(side: OptionSide, spot: number, strike: number): number {
  return side === 'call' ? Math.max(spot - strike, 0) : Math.max(strike - spot, 0);
}

export function isInTheMoney(side: OptionSide, spot: number, strike: number): boolean {
  return side === 'call' ? spot > strike : strike > spot;
}

/** Side-agnostic bucket; pair with the option side to read it. */
export function categorizeMoneyness(moneyness: number, atmBand = DEFAULT_ATM_BAND): MoneynessCategory {
  if (Math.abs(moneyness) < atmBand) return 'ATM';
  return moneyness > 0 ? 'OTM_CALL_ITM_PUT' : 'ITM_CALL_OTM_PUT';
}

/**
 * Liquidity cost of one quote: half the spread, plus for ITM options whatever
 * the last trade gave up below intrinsic value.
 */
export function liquidityCost(isItm: boolean, intrinsic: number, lastPrice: number, spread: number) {
  const itmDiscount = isItm && intrinsic > 0 ? Math.max(0, intrinsic - lastPrice) : 0;
  const spreadCost = spread / 2;
  const effectiveLiquidityCost = isItm ? itmDiscount + spreadCost : spreadCost;
  return { itmDiscount, spreadCost, effectiveLiquidityCost };
}

/** Pure per-row derivation; needs nothing beyond the quote and its date's spot. */
export function deriveQuote(quote: OptionQuote, options: DeriveOptions = {}): DerivedQuote {
  const { strike, lastPrice, bid, ask, optionSide } = quote;
  const spot = quote.underlyingClose;

  const moneyness = computeMoneyness(strike, spot);
  const intrinsic = intrinsicValue(optionSide, spot, strike);
  const isItm = isInTheMoney(optionSide, spot, strike);
  const bidAskSpread = ask - bid;
  const midPrice = (bid + ask) / 2;
  const { itmDiscount, spreadCost, effectiveLiquidityCost } = liquidityCost(isItm, intrinsic, lastPrice, bidAskSpread);

  return {
    ...quote,
    moneyness,
    strikeOffset: strike - spot,
    intrinsicValue: intrinsic,
    timeValue: lastPrice - intrinsic,
    isItm,
    itmFlagAgrees: quote.inTheMoney === null ? null : quote.inTheMoney === isItm,
    bidAskSpread,
    midPrice,
    lastVsMid: midPrice > 0 ? (midPrice - lastPrice) / midPrice : 0,
    itmDiscount,
    spreadCost,
    effectiveLiquidityCost,
    marketMakerProfitPerContract: effectiveLiquidityCost * CONTRACT_MULTIPLIER,
    moneynessCategory: categorizeMoneyness(moneyness, options.atmBand),
  };
}

/**
 * Derive every usable row of the normalized table. Sources missing a required
 * column, rows with side `unknown` and rows with unusable values are left out;
 * the first and last are reported. Recorded in-the-money flags that disagree
 * with the derived one are reported but never overwritten.
 */
export function deriveDataset(dataset: NormalizedDataset, options: DeriveOptions = {}): StageResult<DerivedQuote[]> {
  const warnings: PipelineWarning[] = [];
  const excluded = new Set<number>();

  for (const source of dataset.sources) {
    if (source.status !== 'ok') continue;
    const fields = missingColumns(source.columns);
    if (fields.length > 0) {
      excluded.add(source.sourceIndex);
      warnings.push({ code: 'MISSING_FIELD', sourceId: source.sourceId, fields });
    }
  }

  const quotes: DerivedQuote[] = [];
  for (const row of dataset.rows) {
    if (excluded.has(row.sourceIndex) || row.optionSide === 'unknown') continue;

    const parsed = toOptionQuote(row, row.optionSide);
    if (!parsed.ok) {
      warnings.push({ code: 'INVALID_ROW', sourceId: row.sourceId, rowIndex: row.rowIndex, message: parsed.message });
      continue;
    }

    const derived = deriveQuote(parsed.quote, options);
    if (derived.itmFlagAgrees === false && derived.inTheMoney !== null) {
      warnings.push({
        code: 'ITM_FLAG_MISMATCH',
        sourceId: derived.sourceId,
        rowIndex: derived.rowIndex,
        optionSide: derived.optionSide,
        strike: derived.strike,
        recorded: derived.inTheMoney,
        derived: derived.isItm,
      });
    }
    quotes.push(derived);
  }

  return { value: quotes, warnings };
}
