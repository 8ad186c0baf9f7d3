import type { NormalizedDataset, SourceSide } from '../types/quotes.js';
import type { PipelineWarning } from '../types/diagnostics.js';

interface KeyGroup {
  tradeDate: string;
  optionSide: SourceSide;
  strike: number;
  sourceIds: string[];
  sourceIndexes: Set<number>;
  rowCount: number;
}

/**
 * Flag every (trade date, side, strike) key carried by more than one row.
 * Rows are never removed; this only reports them for audit.
 */
export function findDuplicateKeys(dataset: NormalizedDataset): PipelineWarning[] {
  const groups = new Map<string, KeyGroup>();

  for (const row of dataset.rows) {
    const strike = row.fields['strike'];
    if (typeof strike !== 'number') continue;

    const key = `${row.tradeDate}|${row.optionSide}|${strike}`;
    const group = groups.get(key);
    if (group) {
      group.rowCount++;
      if (!group.sourceIndexes.has(row.sourceIndex)) {
        group.sourceIndexes.add(row.sourceIndex);
        group.sourceIds.push(row.sourceId);
      }
    } else {
      groups.set(key, {
        tradeDate: row.tradeDate,
        optionSide: row.optionSide,
        strike,
        sourceIds: [row.sourceId],
        sourceIndexes: new Set([row.sourceIndex]),
        rowCount: 1,
      });
    }
  }

  return [...groups.values()]
    .filter(g => g.rowCount > 1)
    .map(({ tradeDate, optionSide, strike, sourceIds, rowCount }) => ({
      code: 'DUPLICATE_KEY' as const,
      tradeDate,
      optionSide,
      strike,
      sourceIds,
      rowCount,
    }));
}
