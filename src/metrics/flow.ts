import { volumeOf } from './aggregates.js';
import { mean, presentValues, sum } from './stats.js';
import type { DerivedQuote, OptionSide } from '../types/quotes.js';
import type { DailyFlow, ItmOtmBucket } from '../types/metrics.js';

function sideFlow(quotes: DerivedQuote[], side: OptionSide) {
  const own = quotes.filter(q => q.optionSide === side);
  return {
    volume: sum(own.map(volumeOf)),
    openInterest: sum(own.map(q => q.openInterest ?? 0)),
    meanIv: mean(presentValues(own.map(q => q.impliedVolatility))),
    meanSpread: mean(own.map(q => q.bidAskSpread)),
  };
}

/** Per-date call/put volume, open interest, IV and spread, with the put/call volume ratio. */
export function dailyFlow(quotes: DerivedQuote[]): DailyFlow[] {
  const byDate = new Map<string, DerivedQuote[]>();
  for (const q of quotes) {
    const bucket = byDate.get(q.tradeDate);
    if (bucket) bucket.push(q);
    else byDate.set(q.tradeDate, [q]);
  }

  return [...byDate.keys()].sort().map(tradeDate => {
    const day = byDate.get(tradeDate) ?? [];
    const calls = sideFlow(day, 'call');
    const puts = sideFlow(day, 'put');
    return {
      tradeDate,
      callVolume: calls.volume,
      putVolume: puts.volume,
      callOpenInterest: calls.openInterest,
      putOpenInterest: puts.openInterest,
      callMeanIv: calls.meanIv,
      putMeanIv: puts.meanIv,
      callMeanSpread: calls.meanSpread,
      putMeanSpread: puts.meanSpread,
      putCallRatio: calls.volume > 0 ? puts.volume / calls.volume : null,
    };
  });
}

const flagOrder = (flag: boolean | null): number => (flag === false ? 0 : flag === true ? 1 : 2);

/** Volume and IV by side and the in-the-money flag the source recorded. */
export function itmOtmBreakdown(quotes: DerivedQuote[]): ItmOtmBucket[] {
  const buckets = new Map<string, { optionSide: OptionSide; inTheMoney: boolean | null; quotes: DerivedQuote[] }>();
  for (const q of quotes) {
    const id = `${q.optionSide}|${String(q.inTheMoney)}`;
    const bucket = buckets.get(id);
    if (bucket) bucket.quotes.push(q);
    else buckets.set(id, { optionSide: q.optionSide, inTheMoney: q.inTheMoney, quotes: [q] });
  }

  return [...buckets.values()]
    .sort((a, b) =>
      a.optionSide === b.optionSide
        ? flagOrder(a.inTheMoney) - flagOrder(b.inTheMoney)
        : a.optionSide < b.optionSide ? -1 : 1
    )
    .map(({ optionSide, inTheMoney, quotes: members }) => {
      const volumeSum = sum(members.map(volumeOf));
      return {
        optionSide,
        inTheMoney,
        count: members.length,
        volumeSum,
        volumeMean: volumeSum / members.length,
        meanIv: mean(presentValues(members.map(q => q.impliedVolatility))),
      };
    });
}
