import { z } from 'zod';
import type { NormalizedRow, OptionQuote, OptionSide } from '../types/quotes.js';

/** Columns every source must carry for its rows to enter metric derivation. */
export const REQUIRED_COLUMNS = [
  'strike',
  'bid',
  'ask',
  'lastPrice',
  'volume',
  'openInterest',
  'impliedVolatility',
  'inTheMoney',
  'spx_close',
  'vix_close',
  'lastTradeDate',
] as const;

const price = z.number().finite().nonnegative();
const count = z.number().finite().nonnegative().nullable();

const quoteRowSchema = z.object({
  strike: price,
  bid: price,
  ask: price,
  lastPrice: price,
  volume: count,
  openInterest: count,
  impliedVolatility: z.number().finite().nullable(),
  inTheMoney: z.boolean().nullable(),
  spx_close: z.number().finite().positive(),
  vix_close: z.number().finite().nullable(),
  lastTradeDate: z
    .union([z.string(), z.number()])
    .nullable()
    .transform(v => (v === null ? null : String(v))),
});

export function missingColumns(columns: string[]): string[] {
  return REQUIRED_COLUMNS.filter(c => !columns.includes(c));
}

export type QuoteParseResult =
  | { ok: true; quote: OptionQuote }
  | { ok: false; message: string };

/** Typed quote from a normalized row, or the reasons its values are unusable. */
export function toOptionQuote(row: NormalizedRow, side: OptionSide): QuoteParseResult {
  const parsed = quoteRowSchema.safeParse(row.fields);
  if (!parsed.success) {
    const message = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
    return { ok: false, message };
  }

  const f = parsed.data;
  return {
    ok: true,
    quote: {
      tradeDate: row.tradeDate,
      optionSide: side,
      strike: f.strike,
      bid: f.bid,
      ask: f.ask,
      lastPrice: f.lastPrice,
      volume: f.volume,
      openInterest: f.openInterest,
      impliedVolatility: f.impliedVolatility,
      underlyingClose: f.spx_close,
      volIndexClose: f.vix_close,
      inTheMoney: f.inTheMoney,
      lastTradeDate: f.lastTradeDate,
      sourceId: row.sourceId,
      sourceIndex: row.sourceIndex,
      rowIndex: row.rowIndex,
    },
  };
}
