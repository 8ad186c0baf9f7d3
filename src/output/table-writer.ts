import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { stringify } from 'csv-stringify/sync';
import { TAG_COLUMNS } from '../types/quotes.js';
import type { CellValue, DerivedQuote, NormalizedDataset, NormalizedRow } from '../types/quotes.js';
import type { PipelineResult } from '../pipeline/analysis-pipeline.js';

/** Derived columns appended to the normalized columns in the metrics table. */
export const DERIVED_COLUMNS: ReadonlyArray<[string, (q: DerivedQuote) => CellValue]> = [
  ['moneyness', q => q.moneyness],
  ['strike_offset', q => q.strikeOffset],
  ['intrinsic_value', q => q.intrinsicValue],
  ['time_value', q => q.timeValue],
  ['is_itm', q => q.isItm],
  ['itm_flag_agrees', q => q.itmFlagAgrees],
  ['bid_ask_spread', q => q.bidAskSpread],
  ['mid_price', q => q.midPrice],
  ['last_vs_mid', q => q.lastVsMid],
  ['itm_discount', q => q.itmDiscount],
  ['spread_cost', q => q.spreadCost],
  ['effective_liquidity_cost', q => q.effectiveLiquidityCost],
  ['market_maker_profit_per_contract', q => q.marketMakerProfitPerContract],
  ['moneyness_category', q => q.moneynessCategory],
];

/** Text form of a cell; booleans use the True/False spelling the sources use. */
export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  return String(value);
}

function sourceCells(row: NormalizedRow, dataset: NormalizedDataset): string[] {
  const tags = new Set<string>(TAG_COLUMNS);
  return dataset.columns.map(column => {
    if (!tags.has(column)) return formatCell(row.fields[column]);
    if (column === 'trade_date') return row.tradeDate;
    if (column === 'option_side') return row.optionSide;
    return row.sourceId;
  });
}

/** Combined table: every source column, then trade_date, option_side, source_id. */
export function normalizedTableCsv(dataset: NormalizedDataset): string {
  const records = [dataset.columns, ...dataset.rows.map(row => sourceCells(row, dataset))];
  return stringify(records);
}

/** Normalized columns of each derived quote's row followed by its derived fields. */
export function derivedTableCsv(dataset: NormalizedDataset, quotes: DerivedQuote[]): string {
  const rowsByKey = new Map<string, NormalizedRow>();
  for (const row of dataset.rows) {
    rowsByKey.set(`${row.sourceIndex}#${row.rowIndex}`, row);
  }

  const header = [...dataset.columns, ...DERIVED_COLUMNS.map(([name]) => name)];
  const records = [header];
  for (const q of quotes) {
    const row = rowsByKey.get(`${q.sourceIndex}#${q.rowIndex}`);
    if (!row) continue;
    records.push([...sourceCells(row, dataset), ...DERIVED_COLUMNS.map(([, get]) => formatCell(get(q)))]);
  }
  return stringify(records);
}

export interface WrittenFiles {
  normalized: string;
  derived: string;
  surfaces: string;
  report: string;
}

/** Persist one pipeline run as flat files under `outputDir`. */
export function writePipelineOutputs(outputDir: string, result: PipelineResult): WrittenFiles {
  mkdirSync(outputDir, { recursive: true });

  const files: WrittenFiles = {
    normalized: join(outputDir, 'options_combined.csv'),
    derived: join(outputDir, 'options_derived_metrics.csv'),
    surfaces: join(outputDir, 'surfaces.json'),
    report: join(outputDir, 'report.json'),
  };

  writeFileSync(files.normalized, normalizedTableCsv(result.normalized));
  writeFileSync(files.derived, derivedTableCsv(result.normalized, result.derived));
  writeFileSync(files.surfaces, JSON.stringify(result.surfaces));
  writeFileSync(
    files.report,
    JSON.stringify(
      {
        runId: result.runId,
        summary: result.summary,
        liquidity: result.liquidity,
        highVolume: result.highVolume,
        flow: result.flow,
        itmOtm: result.itmOtm,
        timeline: result.timeline,
        ivHeatmap: result.ivHeatmap,
        sideAverages: result.sideAverages,
        coverage: result.coverage,
        sources: result.normalized.sources,
        warnings: result.warnings,
      },
      null,
      2
    )
  );

  return files;
}
