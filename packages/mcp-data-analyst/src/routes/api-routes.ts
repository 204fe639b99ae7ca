/**
 * JSON REST API
 *
 * Mirrors the MCP tools for plain HTTP clients. Bodies and responses use
 * snake_case keys. Errors are `{ error: { code, message } }`:
 * - 400 invalid input (including malformed JSON and schema violations)
 * - 404 unknown dataset or query, or a query without a chart
 * - 409 a query that was already executed
 * - 502 model failures, 504 model timeout
 * - 500 configuration problems and anything unexpected
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { ZodError } from 'zod';
import type { DatasetHistoryEntry, QueryDetails, QuerySummary } from '../history/types.ts';
import {
  AnalyzeDatasetSchema,
  CleanupSchema,
  GenerateCodeSchema,
  LimitSchema,
  RegisterDatasetSchema,
} from '../schemas/analysis.schema.ts';
import type { AnalystService } from '../services/analyst-service.ts';
import type { ExecutionResult } from '../services/code-executor.ts';
import type { ModelDescriptor } from '../services/model-provider.ts';
import { DataAnalystError, errorMessage } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_INPUT: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  MODEL_UNAVAILABLE: 502,
  MODEL_CALL_ERROR: 502,
  MODEL_RETRIES_EXHAUSTED: 502,
  EMPTY_MODEL_RESPONSE: 502,
  MODEL_TIMEOUT: 504,
  CONFIGURATION_ERROR: 500,
  HISTORY_STORE_ERROR: 500,
};

/**
 * Extracts a route param as a single string (Express 5 params may be string | string[]).
 */
function paramString(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value[0] ?? '';
  return value ?? '';
}

function chartUrl(queryId: string): string {
  return `/api/queries/${encodeURIComponent(queryId)}/chart`;
}

export function executionJson(queryId: string, result: ExecutionResult) {
  return {
    success: result.success,
    reason: result.success ? null : result.reason,
    error_type: result.success ? null : result.errorType,
    exit_code: result.exitCode,
    output: result.output,
    stdout: result.stdout,
    stderr: result.stderr,
    chart_exists: result.chartExists,
    chart_url: result.chartExists ? chartUrl(queryId) : null,
    duration_ms: result.durationMs,
  };
}

function datasetJson(entry: DatasetHistoryEntry) {
  return {
    id: entry.id,
    name: entry.name,
    filename: entry.filename,
    columns: entry.columns,
    row_count: entry.rowCount,
    upload_date: entry.uploadDate.toISOString(),
    last_used: entry.lastUsed.toISOString(),
    is_favorite: entry.isFavorite,
    usage_count: entry.usageCount,
  };
}

function querySummaryJson(query: QuerySummary) {
  return {
    id: query.id,
    question: query.question,
    dataset_name: query.datasetName,
    model: query.model,
    timestamp: query.timestamp.toISOString(),
    execution_success: query.executionSuccess,
  };
}

function queryDetailsJson(query: QueryDetails) {
  return {
    ...querySummaryJson(query),
    generated_code: query.generatedCode,
    dataset_columns: query.datasetColumns,
    execution: query.execution
      ? {
          output: query.execution.output,
          success: query.execution.success,
          duration_ms: query.execution.durationMs,
          executed_at: query.execution.executedAt.toISOString(),
        }
      : null,
    results: query.results.map((result) => ({
      id: result.id,
      type: result.type,
      data: result.data ?? null,
      chart_url: result.type === 'plot' ? chartUrl(query.id) : null,
      timestamp: result.timestamp.toISOString(),
    })),
  };
}

function modelJson(model: ModelDescriptor) {
  return {
    id: model.id,
    display_name: model.displayName,
    description: model.description ?? null,
    input_token_limit: model.inputTokenLimit ?? null,
    output_token_limit: model.outputTokenLimit ?? null,
  };
}

export function sendApiError(res: Response, status: number, code: string, message: string): void {
  if (res.headersSent) return;
  res.status(status).json({ error: { code, message } });
}

/** Error middleware for the API router; must be registered after the routes. */
export function apiErrorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    sendApiError(res, 400, 'INVALID_INPUT', message);
    return;
  }
  if (error instanceof SyntaxError && 'body' in error) {
    sendApiError(res, 400, 'INVALID_INPUT', 'Malformed JSON body');
    return;
  }
  if (error instanceof DataAnalystError) {
    const status = STATUS_BY_CODE[error.code] ?? 500;
    if (status >= 500) {
      logger.error({ method: req.method, path: req.path, code: error.code, error: error.message }, 'API request failed');
    }
    sendApiError(res, status, error.code, error.message);
    return;
  }

  logger.error({ method: req.method, path: req.path, error: errorMessage(error) }, 'Unexpected API error');
  sendApiError(res, 500, 'INTERNAL_ERROR', 'Internal server error');
}

/**
 * Registers the REST API under /api on the Express app.
 */
export function setupApiRoutes(app: express.Application, service: AnalystService): void {
  const router = express.Router();
  router.use(express.json({ limit: '50mb' }));

  router.post('/datasets', async (req: Request, res: Response) => {
    const dataset = RegisterDatasetSchema.parse(req.body);
    const registered = await service.registerDataset(dataset);
    res.status(201).json({ dataset_id: registered.datasetId, name: registered.name, row_count: registered.rowCount });
  });

  router.get('/datasets/history', async (req: Request, res: Response) => {
    const { limit } = LimitSchema.parse(req.query);
    const datasets = await service.listHistory(limit);
    res.json({ datasets: datasets.map(datasetJson) });
  });

  router.get('/datasets/favorites', async (_req: Request, res: Response) => {
    const favorites = await service.listFavorites();
    res.json({ favorites: favorites.map(datasetJson) });
  });

  router.post('/datasets/cleanup', async (req: Request, res: Response) => {
    const { older_than_days } = CleanupSchema.parse(req.body ?? {});
    const removed = await service.cleanupDatasets(older_than_days);
    res.json({ removed_count: removed.length });
  });

  router.post('/datasets/:id/favorite', async (req: Request, res: Response) => {
    const isFavorite = await service.toggleFavorite(paramString(req.params.id));
    res.json({ is_favorite: isFavorite });
  });

  router.delete('/datasets/:id', async (req: Request, res: Response) => {
    const deleted = await service.deleteDataset(paramString(req.params.id));
    res.json({ deleted });
  });

  router.post('/generate_code', async (req: Request, res: Response) => {
    const { columns, question, dataset_name, model } = GenerateCodeSchema.parse(req.body);
    const outcome = await service.generateCode({ columns, question, datasetName: dataset_name, model });
    res.json({
      generated_code: outcome.code,
      query_id: outcome.queryId,
      execution_time: outcome.durationMs / 1000,
      model: outcome.model,
      attempts: outcome.attempts,
    });
  });

  router.post('/analyze', async (req: Request, res: Response) => {
    const { dataset_name, question, model } = AnalyzeDatasetSchema.parse(req.body);
    const outcome = await service.analyze(dataset_name, question, model);
    res.json({
      query_id: outcome.queryId,
      generated_code: outcome.code,
      model: outcome.model,
      attempts: outcome.attempts,
      generation_time: outcome.durationMs / 1000,
      execution: executionJson(outcome.queryId, outcome.execution),
    });
  });

  router.get('/queries/recent', async (req: Request, res: Response) => {
    const { limit } = LimitSchema.parse(req.query);
    const queries = await service.recentQueries(limit);
    res.json({ queries: queries.map(querySummaryJson) });
  });

  router.post('/queries/:id/execute', async (req: Request, res: Response) => {
    const queryId = paramString(req.params.id);
    const { execution } = await service.executeQuery(queryId);
    res.json({ query_id: queryId, execution: executionJson(queryId, execution) });
  });

  router.get('/queries/:id/chart', async (req: Request, res: Response) => {
    const chart = await service.readChart(paramString(req.params.id));
    res.type('png').send(chart);
  });

  router.get('/queries/:id', async (req: Request, res: Response) => {
    const query = await service.queryDetails(paramString(req.params.id));
    res.json(queryDetailsJson(query));
  });

  router.get('/statistics', async (_req: Request, res: Response) => {
    const stats = await service.statistics();
    res.json({
      total_queries: stats.totalQueries,
      successful_queries: stats.successfulQueries,
      success_rate: stats.successRate,
      total_datasets: stats.totalDatasets,
    });
  });

  router.get('/models', async (_req: Request, res: Response) => {
    const models = await service.listModels();
    res.json({ models: models.map(modelJson) });
  });

  router.use((_req: Request, res: Response) => {
    sendApiError(res, 404, 'NOT_FOUND', 'Route not found');
  });
  router.use(apiErrorHandler);

  app.use('/api', router);
}
