import { describe, expect, it } from 'vitest';
import { binIndex, dailyTimeline, equalWidthEdges, ivMoneynessHeatmap, sideAverages } from '../timeline.js';
import { makeDerived } from '../../test/factories.js';

describe('dailyTimeline', () => {
  it('takes each date closes from its first quote and sums volume', () => {
    const quotes = [
      makeDerived({ tradeDate: '2025-03-11', underlyingClose: 4980, volIndexClose: 21, volume: 10 }),
      makeDerived({ tradeDate: '2025-03-10', underlyingClose: 5005, volIndexClose: 18.5, volume: 100 }),
      makeDerived({ tradeDate: '2025-03-10', optionSide: 'put', inTheMoney: false, volume: null }),
      makeDerived({ tradeDate: '2025-03-11', underlyingClose: 4980, volIndexClose: null, volume: 5 }),
    ];

    expect(dailyTimeline(quotes)).toEqual([
      { tradeDate: '2025-03-10', underlyingClose: 5005, volIndexClose: 18.5, totalVolume: 100 },
      { tradeDate: '2025-03-11', underlyingClose: 4980, volIndexClose: 21, totalVolume: 15 },
    ]);
  });

  it('is empty without quotes', () => {
    expect(dailyTimeline([])).toEqual([]);
  });
});

describe('equalWidthEdges', () => {
  it('splits the range into equal widths ending on the maximum', () => {
    expect(equalWidthEdges(0, 4, 4)).toEqual([0, 1, 2, 3, 4]);
  });

  it('widens a single value around itself', () => {
    expect(equalWidthEdges(0, 0, 2)).toEqual([-0.001, 0, 0.001]);
  });
});

describe('binIndex', () => {
  it('closes bins on the right and keeps the lowest edge in the first bin', () => {
    const edges = [0, 1, 2, 3, 4];
    expect([0, 0.5, 1, 1.5, 4].map(v => binIndex(edges, v))).toEqual([0, 0, 0, 1, 3]);
  });
});

describe('ivMoneynessHeatmap', () => {
  it('averages IV per date and moneyness bin over both sides', () => {
    const quotes = [
      makeDerived({ strike: 4900, underlyingClose: 5000, impliedVolatility: 0.25 }),
      makeDerived({ strike: 4900, underlyingClose: 5000, optionSide: 'put', inTheMoney: false, impliedVolatility: 0.75 }),
      makeDerived({ strike: 5000, underlyingClose: 5000, impliedVolatility: 0.2 }),
      makeDerived({ strike: 5100, underlyingClose: 5000, impliedVolatility: null }),
      makeDerived({ tradeDate: '2025-03-11', strike: 5100, underlyingClose: 5000, impliedVolatility: 0.4 }),
    ];

    const heatmap = ivMoneynessHeatmap(quotes, 4);

    expect(heatmap.edges).toHaveLength(5);
    expect(heatmap.dates).toEqual(['2025-03-10', '2025-03-11']);
    expect(heatmap.values).toEqual([
      [0.5, 0.2, null, null],
      [null, null, null, 0.4],
    ]);
  });

  it('uses twenty bins by default', () => {
    const heatmap = ivMoneynessHeatmap([makeDerived({ strike: 4900 }), makeDerived({ strike: 5100 })]);

    expect(heatmap.edges).toHaveLength(21);
    expect(heatmap.values[0]).toHaveLength(20);
    expect(heatmap.values[0]?.[0]).toBe(0.21);
    expect(heatmap.values[0]?.[19]).toBe(0.21);
  });

  it('puts a single moneyness value in one bin', () => {
    const [row] = ivMoneynessHeatmap([makeDerived()]).values;
    expect(row?.filter(v => v !== null)).toEqual([0.21]);
  });

  it('is empty without quotes and rejects a bad bin count', () => {
    expect(ivMoneynessHeatmap([])).toEqual({ edges: [], dates: [], values: [] });
    expect(() => ivMoneynessHeatmap([makeDerived()], 0)).toThrow(RangeError);
  });
});

describe('sideAverages', () => {
  it('averages volume and IV per side over quotes that carry them', () => {
    const quotes = [
      makeDerived({ volume: 100, impliedVolatility: 0.25 }),
      makeDerived({ volume: 300, impliedVolatility: 0.75 }),
      makeDerived({ optionSide: 'put', inTheMoney: false, volume: null, impliedVolatility: 0.5 }),
      makeDerived({ optionSide: 'put', inTheMoney: false, volume: 50, impliedVolatility: null }),
    ];

    expect(sideAverages(quotes)).toEqual({ callMeanVolume: 200, putMeanVolume: 50, callMeanIv: 0.5, putMeanIv: 0.5 });
  });

  it('leaves a side without quotes empty', () => {
    expect(sideAverages([makeDerived()])).toMatchObject({ putMeanVolume: null, putMeanIv: null });
  });
});
