import type { TextContent } from '@modelcontextprotocol/sdk/types.js';
import { CleanupSchema, DatasetIdSchema, LimitSchema, QueryIdSchema } from '../schemas/analysis.schema.ts';
import type { AnalystService } from '../services/analyst-service.ts';
import { formatDatasetEntry, formatQueryDetails, formatQuerySummary } from '../utils/model-formatting.ts';

type TextResult = { content: TextContent[] };

function text(value: string): TextResult {
  return { content: [{ type: 'text', text: value }] };
}

export async function listDatasetHistory(input: unknown, service: AnalystService): Promise<TextResult> {
  const { limit } = LimitSchema.parse(input ?? {});
  const entries = await service.listHistory(limit);
  if (entries.length === 0) {
    return text('No datasets registered yet.');
  }
  return text(`# Dataset History\n\n${entries.map(formatDatasetEntry).join('\n\n')}`);
}

export async function toggleFavorite(input: unknown, service: AnalystService): Promise<TextResult> {
  const { dataset_id } = DatasetIdSchema.parse(input);
  const isFavorite = await service.toggleFavorite(dataset_id);
  return text(`Dataset ${dataset_id} is ${isFavorite ? 'now' : 'no longer'} a favorite.`);
}

export async function cleanupDatasets(input: unknown, service: AnalystService): Promise<TextResult> {
  const { older_than_days } = CleanupSchema.parse(input ?? {});
  const removed = await service.cleanupDatasets(older_than_days);
  if (removed.length === 0) {
    return text('No stale datasets to remove.');
  }
  return text(`Removed ${removed.length} dataset(s): ${removed.map((entry) => entry.name).join(', ')}`);
}

export async function listRecentQueries(input: unknown, service: AnalystService): Promise<TextResult> {
  const { limit } = LimitSchema.parse(input ?? {});
  const queries = await service.recentQueries(limit);
  if (queries.length === 0) {
    return text('No queries logged yet.');
  }
  return text(`# Recent Queries\n\n${queries.map(formatQuerySummary).join('\n')}`);
}

export async function getQuery(input: unknown, service: AnalystService): Promise<TextResult> {
  const { query_id } = QueryIdSchema.parse(input);
  return text(formatQueryDetails(await service.queryDetails(query_id)));
}
