import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { CellValue, SourceRow } from '../types/quotes.js';

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/** Tokens read as a missing value, compared in lower case. */
const MISSING_TOKENS = new Set(['nan', '-nan', 'na', 'n/a', '#n/a', '#na', '<na>', 'null', 'none']);

const recordsSchema = z.array(z.array(z.string()));

export interface SourceTable {
  columns: string[];
  rows: SourceRow[];
}

/**
 * Cell value as the CSV format carries it: empty or a missing-value token such as
 * NA, N/A, null or None → null, numeric literal → number, True/False → boolean,
 * anything else stays text.
 */
export function castCell(raw: string): CellValue {
  const value = raw.trim();
  if (value === '') return null;
  if (NUMERIC.test(value)) return Number(value);

  const lower = value.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (MISSING_TOKENS.has(lower)) return null;
  return value;
}

/**
 * Parse one source's CSV text (header row first). Columns keep their source names.
 * Throws on malformed content, including an empty file or ragged rows.
 */
export function readSourceTable(content: string): SourceTable {
  const records = recordsSchema.parse(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
    })
  );

  const [header, ...body] = records;
  if (!header || header.length === 0) {
    throw new Error('no header row');
  }
  const columns = header.map(c => c.trim());

  const rows = body.map(record => {
    const row: SourceRow = {};
    columns.forEach((column, i) => {
      row[column] = castCell(record[i] ?? '');
    });
    return row;
  });

  return { columns, rows };
}
