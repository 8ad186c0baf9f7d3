import express from 'express';
import type { Express, Response } from 'express';
import type { Server } from 'http';
import { errorMessage } from '../errors.js';
import { queryLiquidity, querySurface, queryWarnings } from './queries.js';
import type { QueryResult } from './queries.js';
import type { PipelineResult } from '../pipeline/analysis-pipeline.js';
import type { PresetOptions } from '../surface/presets.js';

function send<T>(res: Response, result: QueryResult<T>): void {
  if (result.ok) res.json(result.data);
  else res.status(result.status).json({ error: result.error });
}

/**
 * Read-only JSON API over one finished pipeline run, for the rendering layer.
 * Every number it returns comes from the pipeline modules.
 */
export function createDashboardApp(result: PipelineResult, surfaceDefaults: PresetOptions = {}): Express {
  const app = express();

  // ── Run overview ──────────────────────────────────────────────────────────
  app.get('/api/summary', (_req, res) => {
    res.json({
      runId: result.runId,
      summary: result.summary,
      liquidity: result.liquidity.overview,
      sources: result.normalized.sources,
      warningCount: result.warnings.length,
    });
  });

  app.get('/api/coverage', (_req, res) => {
    res.json(result.coverage);
  });

  app.get('/api/high-volume', (_req, res) => {
    res.json(result.highVolume);
  });

  app.get('/api/flow', (_req, res) => {
    res.json({ daily: result.flow, itmOtm: result.itmOtm, sideAverages: result.sideAverages });
  });

  app.get('/api/timeline', (_req, res) => {
    res.json(result.timeline);
  });

  app.get('/api/iv-heatmap', (_req, res) => {
    res.json(result.ivHeatmap);
  });

  // ── Liquidity summaries (groupBy=tradeDate,optionSide,moneynessCategory) ─
  app.get('/api/liquidity', (req, res) => {
    try {
      send(res, queryLiquidity(result, req.query));
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ── Surfaces (built on request from the derived quotes) ───────────────────
  app.get('/api/surfaces/:preset', (req, res) => {
    try {
      send(res, querySurface(result, { ...req.query, preset: req.params.preset }, surfaceDefaults));
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.get('/api/warnings', (req, res) => {
    send(res, queryWarnings(result, req.query));
  });

  return app;
}

export function startDashboard(port: number, result: PipelineResult, surfaceDefaults: PresetOptions = {}): Server {
  const app = createDashboardApp(result, surfaceDefaults);
  return app.listen(port, () => {
    console.log(`[Dashboard] Listening on http://localhost:${port}`);
  });
}
