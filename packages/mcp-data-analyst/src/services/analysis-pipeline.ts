/**
 * Generate → log → execute → log, for one request.
 *
 * Everything a step needs travels in the AnalysisContext the caller builds per
 * request; there is no module-level session state. Generation always finishes
 * before execution starts, and a failed execution is never re-generated.
 */

import { buildAnalysisPrompt } from '../prompts/analysis-prompt.ts';
import type { HistoryStore } from '../history/types.ts';
import { InvalidInputError } from '../utils/errors.ts';
import type { Logger } from '../utils/logger.ts';
import type { CodeExecutor, ExecutionResult } from './code-executor.ts';
import type { CodeGenerator } from './code-generator.ts';
import type { TabularDataset } from './dataset-repository.ts';

export interface ContextDataset {
  /** Registered dataset name, when the request refers to one. */
  name?: string;
  columns: string[];
  rowCount?: number;
  /** Rows to execute against; generation alone works from the columns. */
  data?: TabularDataset;
}

export interface AnalysisSettings {
  chartFilename: string;
  model?: string;
  truncateThreshold?: number;
  rotateThreshold?: number;
}

export interface AnalysisContext {
  requestId: string;
  dataset: ContextDataset;
  settings: AnalysisSettings;
  history: HistoryStore;
  generator: CodeGenerator;
  executor: CodeExecutor;
  logger: Logger;
}

export interface GenerationOutcome {
  queryId: string;
  code: string;
  model: string;
  attempts: number;
  durationMs: number;
}

export interface AnalysisOutcome extends GenerationOutcome {
  execution: ExecutionResult;
}

export async function generateForContext(
  ctx: AnalysisContext,
  question: string,
): Promise<GenerationOutcome> {
  if (!question.trim()) {
    throw new InvalidInputError('Question must not be empty');
  }
  if (ctx.dataset.columns.length === 0) {
    throw new InvalidInputError('At least one column is required');
  }

  const startedAt = Date.now();
  const prompt = buildAnalysisPrompt(
    { columns: ctx.dataset.columns, question },
    {
      chartFilename: ctx.settings.chartFilename,
      truncateThreshold: ctx.settings.truncateThreshold,
      rotateThreshold: ctx.settings.rotateThreshold,
      rowCount: ctx.dataset.rowCount,
    },
  );

  const generated = await ctx.generator.generate({ prompt, model: ctx.settings.model });
  const queryId = await ctx.history.recordQuery({
    question,
    generatedCode: generated.code,
    datasetName: ctx.dataset.name,
    datasetColumns: ctx.dataset.columns,
    model: generated.model,
  });
  const durationMs = Date.now() - startedAt;

  ctx.logger.info({ queryId, model: generated.model, attempts: generated.attempts, durationMs }, 'Query logged');
  return { queryId, code: generated.code, model: generated.model, attempts: generated.attempts, durationMs };
}

export async function executeForContext(
  ctx: AnalysisContext,
  queryId: string,
  code: string,
): Promise<ExecutionResult> {
  const dataset = ctx.dataset.data;
  if (!dataset) {
    throw new InvalidInputError('No dataset loaded for execution');
  }

  const result = await ctx.executor.execute({ runId: queryId, code, dataset });
  await ctx.history.recordExecution(queryId, {
    output: result.output,
    success: result.success,
    durationMs: result.durationMs,
  });

  if (result.success) {
    if (result.output) {
      await ctx.history.recordAnalysisResult(queryId, { type: 'text', data: result.output });
    }
    if (result.chartExists) {
      await ctx.history.recordAnalysisResult(queryId, { type: 'plot', plotPath: result.chartPath });
    }
  }

  ctx.logger.info(
    { queryId, success: result.success, chartExists: result.chartExists, durationMs: result.durationMs },
    'Execution logged',
  );
  return result;
}

export async function analyzeForContext(
  ctx: AnalysisContext,
  question: string,
): Promise<AnalysisOutcome> {
  const generation = await generateForContext(ctx, question);
  const execution = await executeForContext(ctx, generation.queryId, generation.code);
  return { ...generation, execution };
}
