import type { OptionSide, SourceSide } from './quotes.js';

export type PipelineWarning =
  | { code: 'SOURCE_PARSE_ERROR'; sourceId: string; message: string }
  | { code: 'UNKNOWN_SIDE'; sourceId: string; rowCount: number }
  | { code: 'MISSING_FIELD'; sourceId: string; fields: string[] }
  | { code: 'INVALID_ROW'; sourceId: string; rowIndex: number; message: string }
  | { code: 'DUPLICATE_KEY'; tradeDate: string; optionSide: SourceSide; strike: number; sourceIds: string[]; rowCount: number }
  | { code: 'UNDEFINED_AGGREGATE'; group: string; metric: string }
  | {
      code: 'ITM_FLAG_MISMATCH';
      sourceId: string;
      rowIndex: number;
      optionSide: OptionSide;
      strike: number;
      recorded: boolean;
      derived: boolean;
    };

export type WarningCode = PipelineWarning['code'];

/** Result of a stage: its output plus the non-fatal conditions it met. */
export interface StageResult<T> {
  value: T;
  warnings: PipelineWarning[];
}

export function describeWarning(w: PipelineWarning): string {
  switch (w.code) {
    case 'SOURCE_PARSE_ERROR':
      return `${w.sourceId}: skipped (${w.message})`;
    case 'UNKNOWN_SIDE':
      return `${w.sourceId}: no calls/puts token, ${w.rowCount} row(s) kept with side unknown`;
    case 'MISSING_FIELD':
      return `${w.sourceId}: missing column(s) ${w.fields.join(', ')}; rows excluded from metrics`;
    case 'INVALID_ROW':
      return `${w.sourceId} row ${w.rowIndex}: ${w.message}`;
    case 'DUPLICATE_KEY':
      return `${w.tradeDate} ${w.optionSide} ${w.strike}: ${w.rowCount} rows from ${w.sourceIds.join(', ')}`;
    case 'UNDEFINED_AGGREGATE':
      return `${w.group}: zero volume, ${w.metric} undefined`;
    case 'ITM_FLAG_MISMATCH':
      return `${w.sourceId} row ${w.rowIndex}: ${w.optionSide} ${w.strike} recorded inTheMoney=${w.recorded}, derived ${w.derived}`;
  }
}
