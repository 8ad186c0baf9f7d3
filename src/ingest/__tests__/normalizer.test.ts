import { describe, expect, it } from 'vitest';
import { ingestSources } from '../normalizer.js';
import { findDuplicateKeys } from '../duplicates.js';
import { EmptyDatasetError } from '../../errors.js';
import { csvSource, memoryReader } from '../../test/factories.js';

const CALLS = 'dataset/spx_0dte_calls_20250309_2055.csv';
const PUTS = 'dataset/spx_0dte_puts_20250309_2055.csv';

describe('ingestSources', () => {
  it('tags rows and concatenates sources in processing order', () => {
    const readSource = memoryReader({
      [CALLS]: csvSource([{ strike: 5000 }, { strike: 5010 }]),
      [PUTS]: csvSource([{ strike: 4990 }]),
    });

    const { value, warnings } = ingestSources([CALLS, PUTS], { readSource });

    expect(warnings).toEqual([]);
    expect(value.rows.map(r => [r.sourceId, r.rowIndex, r.optionSide, r.tradeDate, r.fields['strike']])).toEqual([
      ['spx_0dte_calls_20250309_2055.csv', 0, 'call', '2025-03-09', 5000],
      ['spx_0dte_calls_20250309_2055.csv', 1, 'call', '2025-03-09', 5010],
      ['spx_0dte_puts_20250309_2055.csv', 0, 'put', '2025-03-09', 4990],
    ]);
    expect(value.columns.slice(-3)).toEqual(['trade_date', 'option_side', 'source_id']);
    expect(value.sources).toHaveLength(2);
  });

  it('unions columns in first-seen order', () => {
    const readSource = memoryReader({
      [CALLS]: 'strike,bid\n5000,1\n',
      [PUTS]: 'strike,ask,bid\n5000,2,1\n',
    });

    const { value } = ingestSources([CALLS, PUTS], { readSource });

    expect(value.columns).toEqual(['strike', 'bid', 'ask', 'trade_date', 'option_side', 'source_id']);
  });

  it('skips an undated source and keeps going', () => {
    const undated = 'dataset/spx_0dte_calls_latest.csv';
    const readSource = memoryReader({ [undated]: csvSource([{}]), [PUTS]: csvSource([{}]) });

    const { value, warnings } = ingestSources([undated, PUTS], { readSource });

    expect(value.rows).toHaveLength(1);
    expect(value.sources[0]).toEqual({
      sourceId: 'spx_0dte_calls_latest.csv',
      sourceIndex: 0,
      status: 'failed',
      error: 'no YYYYMMDD date token in file name',
    });
    expect(warnings).toEqual([
      { code: 'SOURCE_PARSE_ERROR', sourceId: 'spx_0dte_calls_latest.csv', message: 'no YYYYMMDD date token in file name' },
    ]);
  });

  it('skips unreadable content', () => {
    const readSource = memoryReader({ [CALLS]: 'strike,bid\n5000,1,9\n', [PUTS]: csvSource([{}]) });

    const { value, warnings } = ingestSources([CALLS, PUTS], { readSource });

    expect(value.rows.map(r => r.sourceId)).toEqual(['spx_0dte_puts_20250309_2055.csv']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.code).toBe('SOURCE_PARSE_ERROR');
  });

  it('records a missing file as a failed source', () => {
    const readSource = memoryReader({ [PUTS]: csvSource([{}]) });

    const { value } = ingestSources([CALLS, PUTS], { readSource });

    expect(value.sources[0]?.status).toBe('failed');
    expect(value.rows).toHaveLength(1);
  });

  it('keeps rows of a source without a side token as unknown', () => {
    const chain = 'dataset/spx_0dte_chain_20250309.csv';
    const readSource = memoryReader({ [chain]: csvSource([{}, {}]) });

    const { value, warnings } = ingestSources([chain], { readSource });

    expect(value.rows.map(r => r.optionSide)).toEqual(['unknown', 'unknown']);
    expect(warnings).toEqual([{ code: 'UNKNOWN_SIDE', sourceId: 'spx_0dte_chain_20250309.csv', rowCount: 2 }]);
  });

  it('counts a header-only source as ingested', () => {
    const readSource = memoryReader({ [CALLS]: csvSource([]) });

    const { value } = ingestSources([CALLS], { readSource });

    expect(value.rows).toEqual([]);
    expect(value.sources[0]).toMatchObject({ status: 'ok', rowCount: 0 });
  });

  it('tells apart sources that share a file name by their position', () => {
    const first = 'a/spx_0dte_calls_20250309_2055.csv';
    const second = 'b/spx_0dte_calls_20250309_2055.csv';
    const readSource = memoryReader({ [first]: csvSource([{ strike: 5000 }]), [second]: csvSource([{ strike: 4900 }]) });

    const { value } = ingestSources([first, second], { readSource });

    expect(value.rows.map(r => [r.sourceId, r.sourceIndex, r.fields['strike']])).toEqual([
      ['spx_0dte_calls_20250309_2055.csv', 0, 5000],
      ['spx_0dte_calls_20250309_2055.csv', 1, 4900],
    ]);
    expect(value.sources.map(s => s.sourceIndex)).toEqual([0, 1]);
  });

  it('fails on an empty source set', () => {
    expect(() => ingestSources([], { readSource: memoryReader({}) })).toThrow(EmptyDatasetError);
  });

  it('fails when every source fails', () => {
    const readSource = memoryReader({ 'a/undated.csv': 'strike\n1\n' });

    try {
      ingestSources(['a/undated.csv', CALLS], { readSource });
      expect.fail('expected EmptyDatasetError');
    } catch (err) {
      expect(err).toBeInstanceOf(EmptyDatasetError);
      if (err instanceof EmptyDatasetError) {
        expect(err.failures.map(f => f.sourceId)).toEqual(['undated.csv', 'spx_0dte_calls_20250309_2055.csv']);
      }
    }
  });
});

describe('findDuplicateKeys', () => {
  it('flags keys shared across sources and keeps every row', () => {
    const second = 'backup/spx_0dte_calls_20250309_2100.csv';
    const readSource = memoryReader({
      [CALLS]: csvSource([{ strike: 5000 }, { strike: 5010 }]),
      [second]: csvSource([{ strike: 5000 }]),
      [PUTS]: csvSource([{ strike: 5000 }]),
    });
    const { value } = ingestSources([CALLS, second, PUTS], { readSource });

    expect(value.rows).toHaveLength(4);
    expect(findDuplicateKeys(value)).toEqual([
      {
        code: 'DUPLICATE_KEY',
        tradeDate: '2025-03-09',
        optionSide: 'call',
        strike: 5000,
        sourceIds: ['spx_0dte_calls_20250309_2055.csv', 'spx_0dte_calls_20250309_2100.csv'],
        rowCount: 2,
      },
    ]);
  });

  it('lists each contributing source once even when names repeat', () => {
    const first = 'a/spx_0dte_calls_20250309_2055.csv';
    const second = 'b/spx_0dte_calls_20250309_2055.csv';
    const readSource = memoryReader({ [first]: csvSource([{ strike: 5000 }]), [second]: csvSource([{ strike: 5000 }]) });
    const { value } = ingestSources([first, second], { readSource });

    expect(findDuplicateKeys(value)).toMatchObject([
      { sourceIds: ['spx_0dte_calls_20250309_2055.csv', 'spx_0dte_calls_20250309_2055.csv'], rowCount: 2 },
    ]);
  });

  it('reports nothing for distinct keys', () => {
    const readSource = memoryReader({ [CALLS]: csvSource([{ strike: 5000 }]), [PUTS]: csvSource([{ strike: 5000 }]) });
    const { value } = ingestSources([CALLS, PUTS], { readSource });

    expect(findDuplicateKeys(value)).toEqual([]);
  });
});
