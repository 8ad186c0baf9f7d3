import type { SourceSide } from '../types/quotes.js';

const DATE_TOKEN = /(\d{8})/;

/**
 * Trade date from a source identifier such as `spx_0dte_calls_20250309_2055.csv`.
 * The first run of eight digits is read as YYYYMMDD; returns null when there is
 * none or it is not a calendar date.
 */
export function extractTradeDate(sourceId: string): string | null {
  const token = DATE_TOKEN.exec(sourceId)?.[1];
  if (!token) return null;

  const year = Number(token.slice(0, 4));
  const month = Number(token.slice(4, 6));
  const day = Number(token.slice(6, 8));
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }

  return `${token.slice(0, 4)}-${token.slice(4, 6)}-${token.slice(6, 8)}`;
}

export function extractOptionSide(sourceId: string): SourceSide {
  const id = sourceId.toLowerCase();
  if (id.includes('calls')) return 'call';
  if (id.includes('puts')) return 'put';
  return 'unknown';
}
