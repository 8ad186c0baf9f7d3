import { readFileSync } from 'fs';
import { basename } from 'path';
import { EmptyDatasetError, SourceParseError, errorMessage } from '../errors.js';
import { readSourceTable } from './csv-reader.js';
import type { SourceTable } from './csv-reader.js';
import { extractOptionSide, extractTradeDate } from './source-id.js';
import { TAG_COLUMNS } from '../types/quotes.js';
import type { NormalizedDataset, NormalizedRow, SourceReport, SourceSide } from '../types/quotes.js';
import type { PipelineWarning, StageResult } from '../types/diagnostics.js';

export type SourceReader = (path: string) => string;

export const readSourceFile: SourceReader = path => readFileSync(path, 'utf-8');

export interface IngestOptions {
  readSource?: SourceReader;
}

interface LoadedSource {
  sourceId: string;
  sourceIndex: number;
  tradeDate: string;
  optionSide: SourceSide;
  columns: string[];
  rows: NormalizedRow[];
}

function loadSource(path: string, sourceIndex: number, readSource: SourceReader): LoadedSource {
  const sourceId = basename(path);

  const tradeDate = extractTradeDate(sourceId);
  if (!tradeDate) {
    throw new SourceParseError('no YYYYMMDD date token in file name', sourceId);
  }
  const optionSide = extractOptionSide(sourceId);

  let table: SourceTable;
  try {
    table = readSourceTable(readSource(path));
  } catch (err) {
    throw new SourceParseError(`unreadable content: ${errorMessage(err)}`, sourceId);
  }

  const rows = table.rows.map((fields, rowIndex) => ({ tradeDate, optionSide, sourceId, sourceIndex, rowIndex, fields }));
  return { sourceId, sourceIndex, tradeDate, optionSide, columns: table.columns, rows };
}

/**
 * Read every source in order, tag its rows with trade date, side and source id,
 * and concatenate them. A source that cannot be dated or parsed is skipped and
 * reported; the run fails only when nothing at all was ingested.
 */
export function ingestSources(paths: string[], options: IngestOptions = {}): StageResult<NormalizedDataset> {
  const readSource = options.readSource ?? readSourceFile;
  if (paths.length === 0) {
    throw new EmptyDatasetError('No source files to ingest');
  }

  const rows: NormalizedRow[] = [];
  const sources: SourceReport[] = [];
  const warnings: PipelineWarning[] = [];
  const columns: string[] = [];
  const seenColumns = new Set<string>();

  for (const [sourceIndex, path] of paths.entries()) {
    let loaded: LoadedSource;
    try {
      loaded = loadSource(path, sourceIndex, readSource);
    } catch (err) {
      if (!(err instanceof SourceParseError)) throw err;
      sources.push({ sourceId: err.sourceId, sourceIndex, status: 'failed', error: err.message });
      warnings.push({ code: 'SOURCE_PARSE_ERROR', sourceId: err.sourceId, message: err.message });
      continue;
    }

    for (const column of loaded.columns) {
      if (!seenColumns.has(column)) {
        seenColumns.add(column);
        columns.push(column);
      }
    }
    rows.push(...loaded.rows);

    sources.push({
      sourceId: loaded.sourceId,
      sourceIndex,
      status: 'ok',
      tradeDate: loaded.tradeDate,
      optionSide: loaded.optionSide,
      columns: loaded.columns,
      rowCount: loaded.rows.length,
    });

    if (loaded.optionSide === 'unknown') {
      warnings.push({ code: 'UNKNOWN_SIDE', sourceId: loaded.sourceId, rowCount: loaded.rows.length });
    }
  }

  if (!sources.some(s => s.status === 'ok')) {
    const failures = sources.flatMap(s => (s.status === 'failed' ? [{ sourceId: s.sourceId, error: s.error }] : []));
    throw new EmptyDatasetError(`None of ${paths.length} source file(s) could be ingested`, failures);
  }

  return {
    value: { rows, columns: [...columns, ...TAG_COLUMNS], sources },
    warnings,
  };
}
