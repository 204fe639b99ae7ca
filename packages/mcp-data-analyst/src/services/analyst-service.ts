/**
 * Application facade shared by the MCP tools and the REST routes.
 */

import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import type { DatasetHistoryEntry, HistoryStatistics, HistoryStore, QueryDetails, QuerySummary } from '../history/types.ts';
import { ConflictError, InvalidInputError, NotFoundError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import {
  analyzeForContext,
  executeForContext,
  generateForContext,
  type AnalysisContext,
  type AnalysisOutcome,
  type ContextDataset,
  type GenerationOutcome,
} from './analysis-pipeline.ts';
import type { CodeExecutor, ExecutionResult } from './code-executor.ts';
import type { CodeGenerator } from './code-generator.ts';
import type { DatasetRepository, TabularDataset } from './dataset-repository.ts';
import type { ModelDescriptor, ModelProvider } from './model-provider.ts';
import { supportsGeneration } from './model-selector.ts';

export interface AnalystServiceDeps {
  provider: ModelProvider;
  generator: CodeGenerator;
  executor: CodeExecutor;
  history: HistoryStore;
  datasets: DatasetRepository;
  staleAfterDays: number;
}

export interface RegisteredDataset {
  datasetId: string;
  name: string;
  rowCount: number;
}

export interface GenerateCodeInput {
  columns?: string[];
  question: string;
  datasetName?: string;
  model?: string;
}

export interface ExecutionOutcome {
  queryId: string;
  execution: ExecutionResult;
}

export class AnalystService {
  /** Query ids with an execution in progress. */
  private readonly running = new Set<string>();

  constructor(private readonly deps: AnalystServiceDeps) {}

  async registerDataset(input: unknown): Promise<RegisteredDataset> {
    const dataset = await this.deps.datasets.save(input);
    const datasetId = await this.trackUsage(dataset);
    return { datasetId, name: dataset.name, rowCount: dataset.rows.length };
  }

  /**
   * Generates and logs code without running it. With a dataset name the stored
   * dataset supplies the columns (unless given) and its usage is counted.
   */
  async generateCode(input: GenerateCodeInput): Promise<GenerationOutcome> {
    let dataset: ContextDataset;
    if (input.datasetName) {
      const stored = await this.deps.datasets.load(input.datasetName);
      await this.trackUsage(stored);
      dataset = {
        name: stored.name,
        columns: input.columns && input.columns.length > 0 ? input.columns : stored.columns,
        rowCount: stored.rows.length,
      };
    } else {
      dataset = { columns: input.columns ?? [] };
    }
    return generateForContext(this.context(dataset, input.model), input.question);
  }

  /**
   * Runs a logged query against its dataset. A query executes at most once; the
   * id is claimed before the first await, so a concurrent second call fails with
   * ConflictError without starting a process.
   */
  async executeQuery(queryId: string): Promise<ExecutionOutcome> {
    if (this.running.has(queryId)) {
      throw new ConflictError(`Query ${queryId} is already being executed`);
    }
    this.running.add(queryId);
    try {
      return await this.runQuery(queryId);
    } finally {
      this.running.delete(queryId);
    }
  }

  private async runQuery(queryId: string): Promise<ExecutionOutcome> {
    const query = await this.queryDetails(queryId);
    if (query.execution) {
      throw new ConflictError(`Query ${queryId} has already been executed`);
    }
    if (!query.datasetName) {
      throw new InvalidInputError(`Query ${queryId} was generated without a dataset and cannot be executed`);
    }

    const stored = await this.deps.datasets.load(query.datasetName);
    const ctx = this.context({
      name: stored.name,
      columns: stored.columns,
      rowCount: stored.rows.length,
      data: stored,
    });
    const execution = await executeForContext(ctx, queryId, query.generatedCode);
    return { queryId, execution };
  }

  async analyze(datasetName: string, question: string, model?: string): Promise<AnalysisOutcome> {
    const stored = await this.deps.datasets.load(datasetName);
    await this.trackUsage(stored);
    const ctx = this.context(
      { name: stored.name, columns: stored.columns, rowCount: stored.rows.length, data: stored },
      model,
    );
    return analyzeForContext(ctx, question);
  }

  async readChart(queryId: string): Promise<Buffer> {
    await this.queryDetails(queryId);
    try {
      return await readFile(this.deps.executor.chartPathFor(queryId));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new NotFoundError(`No chart for query ${queryId}`);
      }
      throw error;
    }
  }

  async listModels(): Promise<ModelDescriptor[]> {
    const models = await this.deps.provider.listModels();
    return models.filter(supportsGeneration);
  }

  listHistory(limit = 10): Promise<DatasetHistoryEntry[]> {
    return this.deps.history.listHistory(limit);
  }

  listFavorites(): Promise<DatasetHistoryEntry[]> {
    return this.deps.history.listFavorites();
  }

  toggleFavorite(id: string): Promise<boolean> {
    return this.deps.history.toggleFavorite(id);
  }

  /** Drops history entries (and their stored files) unused for `olderThanDays`; favorites stay. */
  async cleanupDatasets(olderThanDays: number = this.deps.staleAfterDays): Promise<DatasetHistoryEntry[]> {
    const removed = await this.deps.history.purgeStale(olderThanDays, { excludeFavorites: true });
    for (const entry of removed) {
      await this.deps.datasets.remove(entry.filename);
    }
    logger.info({ olderThanDays, removed: removed.length }, 'Stale datasets cleaned up');
    return removed;
  }

  /** @returns false when the id is unknown */
  async deleteDataset(id: string): Promise<boolean> {
    const entry = await this.deps.history.deleteDataset(id);
    if (!entry) return false;
    await this.deps.datasets.remove(entry.filename);
    return true;
  }

  recentQueries(limit = 10): Promise<QuerySummary[]> {
    return this.deps.history.listRecentQueries(limit);
  }

  async queryDetails(queryId: string): Promise<QueryDetails> {
    const query = await this.deps.history.getQuery(queryId);
    if (!query) {
      throw new NotFoundError(`Query not found: ${queryId}`);
    }
    return query;
  }

  statistics(): Promise<HistoryStatistics> {
    return this.deps.history.getStatistics();
  }

  private trackUsage(dataset: TabularDataset): Promise<string> {
    return this.deps.history.upsertDatasetUsage({
      filename: dataset.name,
      columns: dataset.columns,
      rowCount: dataset.rows.length,
    });
  }

  private context(dataset: ContextDataset, model?: string): AnalysisContext {
    const requestId = randomUUID();
    return {
      requestId,
      dataset,
      settings: { chartFilename: this.deps.executor.chartFilename, model },
      history: this.deps.history,
      generator: this.deps.generator,
      executor: this.deps.executor,
      logger: logger.child({ requestId }),
    };
  }
}
