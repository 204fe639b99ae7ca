import { randomUUID } from 'node:crypto';
import { ConflictError, NotFoundError } from '../utils/errors.ts';
import {
  DAY_MS,
  successRate,
  type AnalysisResultRecord,
  type Clock,
  type DatasetHistoryEntry,
  type DatasetUsage,
  type ExecutionRecord,
  type HistoryStatistics,
  type HistoryStore,
  type NewAnalysisResult,
  type NewQuery,
  type PurgeOptions,
  type QueryDetails,
  type QuerySummary,
} from './types.ts';

interface StoredQuery extends QueryDetails {
  seq: number;
}

interface StoredDataset extends DatasetHistoryEntry {
  seq: number;
}

/** Process-local store for tests and `HISTORY_BACKEND=memory`. */
export class InMemoryHistoryStore implements HistoryStore {
  private readonly queries = new Map<string, StoredQuery>();
  private readonly datasets = new Map<string, StoredDataset>();
  private seq = 0;

  constructor(private readonly now: Clock = () => new Date()) {}

  async recordQuery(query: NewQuery): Promise<string> {
    const id = randomUUID();
    this.queries.set(id, {
      id,
      seq: this.seq++,
      question: query.question,
      generatedCode: query.generatedCode,
      datasetName: query.datasetName ?? null,
      datasetColumns: [...(query.datasetColumns ?? [])],
      model: query.model ?? null,
      timestamp: this.now(),
      executionSuccess: null,
      execution: null,
      results: [],
    });
    return id;
  }

  async recordExecution(queryId: string, execution: ExecutionRecord): Promise<void> {
    const query = this.requireQuery(queryId);
    if (query.execution) {
      throw new ConflictError(`Execution already recorded for query ${queryId}`);
    }
    query.execution = { ...execution, executedAt: this.now() };
    query.executionSuccess = execution.success;
  }

  async recordAnalysisResult(queryId: string, result: NewAnalysisResult): Promise<string> {
    const query = this.requireQuery(queryId);
    const record: AnalysisResultRecord = { ...result, id: randomUUID(), queryId, timestamp: this.now() };
    query.results.push(record);
    return record.id;
  }

  async getQuery(queryId: string): Promise<QueryDetails | null> {
    const query = this.queries.get(queryId);
    return query ? toQueryDetails(query) : null;
  }

  async listRecentQueries(limit: number): Promise<QuerySummary[]> {
    return [...this.queries.values()]
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime() || b.seq - a.seq)
      .slice(0, limit)
      .map(({ id, question, datasetName, model, timestamp, executionSuccess }) => ({
        id,
        question,
        datasetName,
        model,
        timestamp,
        executionSuccess,
      }));
  }

  async upsertDatasetUsage(usage: DatasetUsage): Promise<string> {
    const now = this.now();
    const existing = [...this.datasets.values()].find((entry) => entry.filename === usage.filename);
    if (existing) {
      existing.usageCount += 1;
      existing.lastUsed = now;
      existing.columns = [...usage.columns];
      existing.rowCount = usage.rowCount;
      existing.seq = this.seq++;
      return existing.id;
    }

    const id = randomUUID();
    this.datasets.set(id, {
      id,
      seq: this.seq++,
      name: usage.name ?? usage.filename,
      filename: usage.filename,
      columns: [...usage.columns],
      rowCount: usage.rowCount,
      uploadDate: now,
      lastUsed: now,
      isFavorite: false,
      usageCount: 1,
    });
    return id;
  }

  async listHistory(limit: number): Promise<DatasetHistoryEntry[]> {
    return this.sortedDatasets().slice(0, limit).map(toEntry);
  }

  async listFavorites(): Promise<DatasetHistoryEntry[]> {
    return this.sortedDatasets()
      .filter((entry) => entry.isFavorite)
      .map(toEntry);
  }

  async getDataset(id: string): Promise<DatasetHistoryEntry | null> {
    const entry = this.datasets.get(id);
    return entry ? toEntry(entry) : null;
  }

  async toggleFavorite(id: string): Promise<boolean> {
    const entry = this.datasets.get(id);
    if (!entry) {
      throw new NotFoundError(`Dataset history entry not found: ${id}`);
    }
    entry.isFavorite = !entry.isFavorite;
    return entry.isFavorite;
  }

  async purgeStale(olderThanDays: number, options: PurgeOptions): Promise<DatasetHistoryEntry[]> {
    const cutoff = this.now().getTime() - olderThanDays * DAY_MS;
    const removed: DatasetHistoryEntry[] = [];
    for (const entry of this.datasets.values()) {
      if (entry.lastUsed.getTime() >= cutoff) continue;
      if (options.excludeFavorites && entry.isFavorite) continue;
      this.datasets.delete(entry.id);
      removed.push(toEntry(entry));
    }
    return removed;
  }

  async deleteDataset(id: string): Promise<DatasetHistoryEntry | null> {
    const entry = this.datasets.get(id);
    if (!entry) return null;
    this.datasets.delete(id);
    return toEntry(entry);
  }

  async getStatistics(): Promise<HistoryStatistics> {
    const totalQueries = this.queries.size;
    const successfulQueries = [...this.queries.values()].filter(
      (query) => query.executionSuccess === true,
    ).length;
    return {
      totalQueries,
      successfulQueries,
      successRate: successRate(successfulQueries, totalQueries),
      totalDatasets: this.datasets.size,
    };
  }

  async close(): Promise<void> {}

  private requireQuery(queryId: string): StoredQuery {
    const query = this.queries.get(queryId);
    if (!query) {
      throw new NotFoundError(`Query not found: ${queryId}`);
    }
    return query;
  }

  private sortedDatasets(): StoredDataset[] {
    return [...this.datasets.values()].sort(
      (a, b) => b.lastUsed.getTime() - a.lastUsed.getTime() || b.seq - a.seq,
    );
  }
}

function toEntry({ seq: _seq, ...entry }: StoredDataset): DatasetHistoryEntry {
  return { ...entry, columns: [...entry.columns] };
}

function toQueryDetails({ seq: _seq, ...query }: StoredQuery): QueryDetails {
  return {
    ...query,
    datasetColumns: [...query.datasetColumns],
    execution: query.execution ? { ...query.execution } : null,
    results: query.results.map((result) => ({ ...result })),
  };
}
