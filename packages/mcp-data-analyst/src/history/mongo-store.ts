/**
 * MongoDB-backed history store.
 *
 * Execution results are written with a conditional update on `execution: null`,
 * so a query's execution can be recorded once even under concurrent requests.
 * Dataset usage is upserted by filename (unique index).
 */

import mongoose, { type HydratedDocument } from 'mongoose';
import { ConflictError, DataAnalystError, HistoryStoreError, NotFoundError, errorMessage } from '../utils/errors.ts';
import { disconnectFromMongoDB } from './mongodb.ts';
import {
  DAY_MS,
  successRate,
  type AnalysisResultRecord,
  type AnalysisResultType,
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
  type QueryExecution,
  type QuerySummary,
} from './types.ts';

interface QueryLog {
  question: string;
  generatedCode: string;
  datasetName: string | null;
  datasetColumns: string[];
  model: string | null;
  timestamp: Date;
  execution: QueryExecution | null;
  executionSuccess: boolean | null;
}

interface AnalysisResultDoc {
  queryId: mongoose.Types.ObjectId;
  type: AnalysisResultType;
  data?: string;
  plotPath?: string;
  timestamp: Date;
}

interface DatasetHistoryDoc {
  name: string;
  filename: string;
  columns: string[];
  rowCount: number;
  uploadDate: Date;
  lastUsed: Date;
  isFavorite: boolean;
  usageCount: number;
}

const executionSchema = new mongoose.Schema<QueryExecution>(
  {
    output: { type: String, default: '' },
    success: { type: Boolean, required: true },
    durationMs: { type: Number, required: true },
    executedAt: { type: Date, required: true },
  },
  { _id: false },
);

const queryLogSchema = new mongoose.Schema<QueryLog>({
  question: { type: String, required: true },
  generatedCode: { type: String, required: true, immutable: true },
  datasetName: { type: String, default: null },
  datasetColumns: { type: [String], default: [] },
  model: { type: String, default: null },
  timestamp: { type: Date, required: true, index: true },
  execution: { type: executionSchema, default: null },
  executionSuccess: { type: Boolean, default: null, index: true },
});

const analysisResultSchema = new mongoose.Schema<AnalysisResultDoc>({
  queryId: { type: mongoose.Schema.Types.ObjectId, ref: 'QueryLog', required: true, index: true },
  type: { type: String, enum: ['text', 'table', 'plot'], required: true },
  data: String,
  plotPath: String,
  timestamp: { type: Date, required: true },
});

const datasetHistorySchema = new mongoose.Schema<DatasetHistoryDoc>({
  name: { type: String, required: true },
  filename: { type: String, required: true, unique: true },
  columns: { type: [String], default: [] },
  rowCount: { type: Number, default: 0 },
  uploadDate: { type: Date, required: true },
  lastUsed: { type: Date, required: true, index: true },
  isFavorite: { type: Boolean, default: false },
  usageCount: { type: Number, default: 1 },
});

const QueryLogModel = mongoose.model<QueryLog>('QueryLog', queryLogSchema);
const AnalysisResultModel = mongoose.model<AnalysisResultDoc>('AnalysisResult', analysisResultSchema);
export const DatasetHistoryModel = mongoose.model<DatasetHistoryDoc>('DatasetHistory', datasetHistorySchema);

function toSummary(doc: HydratedDocument<QueryLog>): QuerySummary {
  return {
    id: doc._id.toString(),
    question: doc.question,
    datasetName: doc.datasetName ?? null,
    model: doc.model ?? null,
    timestamp: doc.timestamp,
    executionSuccess: doc.executionSuccess ?? null,
  };
}

function toResult(doc: HydratedDocument<AnalysisResultDoc>): AnalysisResultRecord {
  return {
    id: doc._id.toString(),
    queryId: doc.queryId.toString(),
    type: doc.type,
    data: doc.data ?? undefined,
    plotPath: doc.plotPath ?? undefined,
    timestamp: doc.timestamp,
  };
}

function toEntry(doc: HydratedDocument<DatasetHistoryDoc>): DatasetHistoryEntry {
  return {
    id: doc._id.toString(),
    name: doc.name,
    filename: doc.filename,
    columns: [...doc.columns],
    rowCount: doc.rowCount,
    uploadDate: doc.uploadDate,
    lastUsed: doc.lastUsed,
    isFavorite: doc.isFavorite,
    usageCount: doc.usageCount,
  };
}

export class MongoHistoryStore implements HistoryStore {
  constructor(private readonly now: Clock = () => new Date()) {}

  async recordQuery(query: NewQuery): Promise<string> {
    return this.guard('recordQuery', async () => {
      const doc = await QueryLogModel.create({
        question: query.question,
        generatedCode: query.generatedCode,
        datasetName: query.datasetName ?? null,
        datasetColumns: query.datasetColumns ?? [],
        model: query.model ?? null,
        timestamp: this.now(),
      });
      return doc._id.toString();
    });
  }

  async recordExecution(queryId: string, execution: ExecutionRecord): Promise<void> {
    return this.guard('recordExecution', async () => {
      if (!mongoose.isValidObjectId(queryId)) {
        throw new NotFoundError(`Query not found: ${queryId}`);
      }
      const updated = await QueryLogModel.findOneAndUpdate(
        { _id: queryId, execution: null },
        { $set: { execution: { ...execution, executedAt: this.now() }, executionSuccess: execution.success } },
        { new: true },
      );
      if (updated) return;

      const exists = await QueryLogModel.exists({ _id: queryId });
      if (!exists) {
        throw new NotFoundError(`Query not found: ${queryId}`);
      }
      throw new ConflictError(`Execution already recorded for query ${queryId}`);
    });
  }

  async recordAnalysisResult(queryId: string, result: NewAnalysisResult): Promise<string> {
    return this.guard('recordAnalysisResult', async () => {
      if (!mongoose.isValidObjectId(queryId) || !(await QueryLogModel.exists({ _id: queryId }))) {
        throw new NotFoundError(`Query not found: ${queryId}`);
      }
      const doc = await AnalysisResultModel.create({
        queryId: new mongoose.Types.ObjectId(queryId),
        type: result.type,
        data: result.data,
        plotPath: result.plotPath,
        timestamp: this.now(),
      });
      return doc._id.toString();
    });
  }

  async getQuery(queryId: string): Promise<QueryDetails | null> {
    return this.guard('getQuery', async () => {
      if (!mongoose.isValidObjectId(queryId)) return null;
      const doc = await QueryLogModel.findById(queryId);
      if (!doc) return null;

      const results = await AnalysisResultModel.find({ queryId: doc._id }).sort({ timestamp: 1 });
      return {
        ...toSummary(doc),
        generatedCode: doc.generatedCode,
        datasetColumns: [...doc.datasetColumns],
        execution: doc.execution
          ? {
              output: doc.execution.output,
              success: doc.execution.success,
              durationMs: doc.execution.durationMs,
              executedAt: doc.execution.executedAt,
            }
          : null,
        results: results.map(toResult),
      };
    });
  }

  async listRecentQueries(limit: number): Promise<QuerySummary[]> {
    return this.guard('listRecentQueries', async () => {
      const docs = await QueryLogModel.find().sort({ timestamp: -1, _id: -1 }).limit(limit);
      return docs.map(toSummary);
    });
  }

  async upsertDatasetUsage(usage: DatasetUsage): Promise<string> {
    return this.guard('upsertDatasetUsage', async () => {
      const now = this.now();
      const doc = await DatasetHistoryModel.findOneAndUpdate(
        { filename: usage.filename },
        {
          $inc: { usageCount: 1 },
          $set: { lastUsed: now, columns: usage.columns, rowCount: usage.rowCount },
          $setOnInsert: { name: usage.name ?? usage.filename, uploadDate: now, isFavorite: false },
        },
        { upsert: true, new: true },
      );
      if (!doc) {
        throw new HistoryStoreError(`Upsert returned no document for ${usage.filename}`);
      }
      return doc._id.toString();
    });
  }

  async listHistory(limit: number): Promise<DatasetHistoryEntry[]> {
    return this.guard('listHistory', async () => {
      const docs = await DatasetHistoryModel.find().sort({ lastUsed: -1, _id: -1 }).limit(limit);
      return docs.map(toEntry);
    });
  }

  async listFavorites(): Promise<DatasetHistoryEntry[]> {
    return this.guard('listFavorites', async () => {
      const docs = await DatasetHistoryModel.find({ isFavorite: true }).sort({ lastUsed: -1, _id: -1 });
      return docs.map(toEntry);
    });
  }

  async getDataset(id: string): Promise<DatasetHistoryEntry | null> {
    return this.guard('getDataset', async () => {
      if (!mongoose.isValidObjectId(id)) return null;
      const doc = await DatasetHistoryModel.findById(id);
      return doc ? toEntry(doc) : null;
    });
  }

  async toggleFavorite(id: string): Promise<boolean> {
    return this.guard('toggleFavorite', async () => {
      if (!mongoose.isValidObjectId(id)) {
        throw new NotFoundError(`Dataset history entry not found: ${id}`);
      }
      const doc = await DatasetHistoryModel.findByIdAndUpdate(
        id,
        [{ $set: { isFavorite: { $not: ['$isFavorite'] } } }],
        { new: true },
      );
      if (!doc) {
        throw new NotFoundError(`Dataset history entry not found: ${id}`);
      }
      return doc.isFavorite;
    });
  }

  async purgeStale(olderThanDays: number, options: PurgeOptions): Promise<DatasetHistoryEntry[]> {
    return this.guard('purgeStale', async () => {
      const cutoff = new Date(this.now().getTime() - olderThanDays * DAY_MS);
      const filter = options.excludeFavorites
        ? { lastUsed: { $lt: cutoff }, isFavorite: false }
        : { lastUsed: { $lt: cutoff } };
      const candidates = await DatasetHistoryModel.find(filter);
      const removed: DatasetHistoryEntry[] = [];
      for (const candidate of candidates) {
        // Entries used or favorited since the scan no longer match and stay.
        const doc = await DatasetHistoryModel.findOneAndDelete({ ...filter, _id: candidate._id });
        if (doc) removed.push(toEntry(doc));
      }
      return removed;
    });
  }

  async deleteDataset(id: string): Promise<DatasetHistoryEntry | null> {
    return this.guard('deleteDataset', async () => {
      if (!mongoose.isValidObjectId(id)) return null;
      const doc = await DatasetHistoryModel.findByIdAndDelete(id);
      return doc ? toEntry(doc) : null;
    });
  }

  async getStatistics(): Promise<HistoryStatistics> {
    return this.guard('getStatistics', async () => {
      const [totalQueries, successfulQueries, totalDatasets] = await Promise.all([
        QueryLogModel.countDocuments(),
        QueryLogModel.countDocuments({ executionSuccess: true }),
        DatasetHistoryModel.countDocuments(),
      ]);
      return {
        totalQueries,
        successfulQueries,
        successRate: successRate(successfulQueries, totalQueries),
        totalDatasets,
      };
    });
  }

  async close(): Promise<void> {
    await disconnectFromMongoDB();
  }

  /** Domain errors pass through; driver failures become HistoryStoreError. */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof DataAnalystError) throw error;
      throw new HistoryStoreError(`History store ${operation} failed: ${errorMessage(error)}`);
    }
  }
}
