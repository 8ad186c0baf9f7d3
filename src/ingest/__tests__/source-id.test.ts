import { describe, expect, it } from 'vitest';
import { extractOptionSide, extractTradeDate } from '../source-id.js';

describe('extractTradeDate', () => {
  it('reads the eight-digit token as YYYYMMDD', () => {
    expect(extractTradeDate('spx_0dte_calls_20250309_2055.csv')).toBe('2025-03-09');
  });

  it('ignores the shorter time token', () => {
    expect(extractTradeDate('spx_0dte_puts_2055_20251231.csv')).toBe('2025-12-31');
  });

  it('uses the first eight digits of a longer run', () => {
    expect(extractTradeDate('chain_202503092055.csv')).toBe('2025-03-09');
  });

  it('returns null when there is no date token', () => {
    expect(extractTradeDate('spx_0dte_calls_latest.csv')).toBeNull();
    expect(extractTradeDate('spx_0dte_calls_2025039.csv')).toBeNull();
  });

  it('returns null for digits that are not a calendar date', () => {
    expect(extractTradeDate('spx_0dte_calls_20250230_2055.csv')).toBeNull();
    expect(extractTradeDate('spx_0dte_calls_20251301_2055.csv')).toBeNull();
  });

  it('accepts leap days', () => {
    expect(extractTradeDate('spx_0dte_calls_20240229.csv')).toBe('2024-02-29');
  });
});

describe('extractOptionSide', () => {
  it('maps calls and puts tokens', () => {
    expect(extractOptionSide('spx_0dte_calls_20250309_2055.csv')).toBe('call');
    expect(extractOptionSide('spx_0dte_puts_20250309_2055.csv')).toBe('put');
  });

  it('matches regardless of case', () => {
    expect(extractOptionSide('SPX_PUTS_20250309.csv')).toBe('put');
  });

  it('falls back to unknown', () => {
    expect(extractOptionSide('spx_0dte_chain_20250309.csv')).toBe('unknown');
  });
});
