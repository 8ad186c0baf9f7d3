import { describe, expect, it } from 'vitest';
import { castCell, readSourceTable } from '../csv-reader.js';

describe('castCell', () => {
  it('keeps what the format natively carries', () => {
    expect(castCell('5000')).toBe(5000);
    expect(castCell('0.215')).toBe(0.215);
    expect(castCell('-1.5e-3')).toBe(-0.0015);
    expect(castCell('True')).toBe(true);
    expect(castCell('false')).toBe(false);
    expect(castCell('')).toBeNull();
    expect(castCell('  ')).toBeNull();
    expect(castCell('NaN')).toBeNull();
    expect(castCell('SPXW250309C05000000')).toBe('SPXW250309C05000000');
    expect(castCell('2025-03-09 20:55:00+00:00')).toBe('2025-03-09 20:55:00+00:00');
  });

  it('reads missing-value tokens as empty', () => {
    expect(['NA', 'N/A', 'n/a', 'null', 'NULL', 'None', ' none ', '#N/A', '<NA>'].map(castCell)).toEqual(
      Array(9).fill(null)
    );
    expect(castCell('Nonesuch')).toBe('Nonesuch');
  });
});

describe('readSourceTable', () => {
  it('reads header and rows without renaming columns', () => {
    const table = readSourceTable('strike,lastPrice,inTheMoney\n5000,12.5,True\n5010,,False\n');

    expect(table.columns).toEqual(['strike', 'lastPrice', 'inTheMoney']);
    expect(table.rows).toEqual([
      { strike: 5000, lastPrice: 12.5, inTheMoney: true },
      { strike: 5010, lastPrice: null, inTheMoney: false },
    ]);
  });

  it('returns no rows for a header-only file', () => {
    const table = readSourceTable('strike,bid\n');
    expect(table.columns).toEqual(['strike', 'bid']);
    expect(table.rows).toEqual([]);
  });

  it('handles quoted fields and a byte-order mark', () => {
    const table = readSourceTable('\uFEFFname,strike\n"SPX, weekly",5000\n');
    expect(table.rows).toEqual([{ name: 'SPX, weekly', strike: 5000 }]);
  });

  it('throws on an empty file', () => {
    expect(() => readSourceTable('')).toThrow('no header row');
  });

  it('throws on ragged rows', () => {
    expect(() => readSourceTable('strike,bid\n5000,1,2\n')).toThrow();
  });
});
