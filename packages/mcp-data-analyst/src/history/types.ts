/**
 * Persistence contract for queries, their execution results and dataset usage.
 * Ids are opaque strings.
 */

export type Clock = () => Date;

export interface NewQuery {
  question: string;
  generatedCode: string;
  datasetName?: string;
  datasetColumns?: string[];
  model?: string;
}

export interface ExecutionRecord {
  output: string;
  success: boolean;
  durationMs: number;
}

export type AnalysisResultType = 'text' | 'table' | 'plot';

export interface NewAnalysisResult {
  type: AnalysisResultType;
  data?: string;
  plotPath?: string;
}

export interface AnalysisResultRecord extends NewAnalysisResult {
  id: string;
  queryId: string;
  timestamp: Date;
}

export interface QueryExecution extends ExecutionRecord {
  executedAt: Date;
}

export interface QuerySummary {
  id: string;
  question: string;
  datasetName: string | null;
  model: string | null;
  timestamp: Date;
  /** null until the query has been executed */
  executionSuccess: boolean | null;
}

export interface QueryDetails extends QuerySummary {
  generatedCode: string;
  datasetColumns: string[];
  execution: QueryExecution | null;
  results: AnalysisResultRecord[];
}

export interface DatasetUsage {
  filename: string;
  /** Display name; defaults to the filename. */
  name?: string;
  columns: string[];
  rowCount: number;
}

export interface DatasetHistoryEntry {
  id: string;
  name: string;
  filename: string;
  columns: string[];
  rowCount: number;
  uploadDate: Date;
  lastUsed: Date;
  isFavorite: boolean;
  usageCount: number;
}

export interface HistoryStatistics {
  totalQueries: number;
  successfulQueries: number;
  /** Percentage of all logged queries that executed successfully (0 when there are none). */
  successRate: number;
  totalDatasets: number;
}

export interface PurgeOptions {
  excludeFavorites: boolean;
}

export interface HistoryStore {
  recordQuery(query: NewQuery): Promise<string>;
  /** @throws NotFoundError for an unknown id, ConflictError when already recorded */
  recordExecution(queryId: string, execution: ExecutionRecord): Promise<void>;
  recordAnalysisResult(queryId: string, result: NewAnalysisResult): Promise<string>;
  getQuery(queryId: string): Promise<QueryDetails | null>;
  listRecentQueries(limit: number): Promise<QuerySummary[]>;

  /** Creates the entry for a new filename, otherwise bumps usage and refreshes its shape. */
  upsertDatasetUsage(usage: DatasetUsage): Promise<string>;
  /** Most recently used first. */
  listHistory(limit: number): Promise<DatasetHistoryEntry[]>;
  listFavorites(): Promise<DatasetHistoryEntry[]>;
  getDataset(id: string): Promise<DatasetHistoryEntry | null>;
  /** @returns the new favorite state */
  toggleFavorite(id: string): Promise<boolean>;
  /** Removes entries last used before now minus `olderThanDays`. */
  purgeStale(olderThanDays: number, options: PurgeOptions): Promise<DatasetHistoryEntry[]>;
  deleteDataset(id: string): Promise<DatasetHistoryEntry | null>;

  getStatistics(): Promise<HistoryStatistics>;
  close(): Promise<void>;
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export function successRate(successful: number, total: number): number {
  return total > 0 ? (successful / total) * 100 : 0;
}
