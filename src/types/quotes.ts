export type OptionSide = 'call' | 'put';

/** Side as read from a source identifier; `unknown` rows are kept for audit. */
export type SourceSide = OptionSide | 'unknown';

/** A single cell as the CSV format provides it. */
export type CellValue = string | number | boolean | null;

export type SourceRow = Record<string, CellValue>;

/** Columns appended to every normalized row. */
export const TAG_COLUMNS = ['trade_date', 'option_side', 'source_id'] as const;

export interface NormalizedRow {
  tradeDate: string;        // YYYY-MM-DD, from the source identifier
  optionSide: SourceSide;
  sourceId: string;         // originating file name
  sourceIndex: number;      // position of the source in the ingested list
  rowIndex: number;         // position within the source
  fields: SourceRow;
}

/** Sources are told apart by `sourceIndex`; two folders may hold the same file name. */
export type SourceReport =
  | {
      sourceId: string;
      sourceIndex: number;
      status: 'ok';
      tradeDate: string;
      optionSide: SourceSide;
      columns: string[];
      rowCount: number;
    }
  | { sourceId: string; sourceIndex: number; status: 'failed'; error: string };

export interface NormalizedDataset {
  rows: NormalizedRow[];
  columns: string[];        // source columns in first-seen order, then TAG_COLUMNS
  sources: SourceReport[];
}

export interface OptionQuote {
  tradeDate: string;
  optionSide: OptionSide;
  strike: number;
  bid: number;
  ask: number;
  lastPrice: number;
  volume: number | null;
  openInterest: number | null;
  impliedVolatility: number | null;
  underlyingClose: number;  // SPX close of tradeDate
  volIndexClose: number | null; // VIX close of tradeDate
  inTheMoney: boolean | null;   // as recorded by the source
  lastTradeDate: string | null;
  sourceId: string;
  sourceIndex: number;
  rowIndex: number;
}

export type MoneynessCategory = 'ATM' | 'OTM_CALL_ITM_PUT' | 'ITM_CALL_OTM_PUT';

export interface DerivedQuote extends OptionQuote {
  moneyness: number;        // (strike - spot) / spot, positive above spot
  strikeOffset: number;     // strike - spot, in dollars
  intrinsicValue: number;
  timeValue: number;        // not clamped; negative means last trade below intrinsic
  isItm: boolean;
  itmFlagAgrees: boolean | null;
  bidAskSpread: number;
  midPrice: number;
  lastVsMid: number;
  itmDiscount: number;
  spreadCost: number;
  effectiveLiquidityCost: number;
  marketMakerProfitPerContract: number;
  moneynessCategory: MoneynessCategory;
}

/** Numeric DerivedQuote fields usable as a metric or an aggregation input. */
export type NumericField = {
  [K in keyof DerivedQuote]-?: DerivedQuote[K] extends number | null ? K : never;
}[keyof DerivedQuote];
