import type { DatasetHistoryEntry, QueryDetails, QuerySummary } from '../history/types.ts';
import type { ExecutionResult } from '../services/code-executor.ts';
import type { ModelDescriptor } from '../services/model-provider.ts';

export function formatModel(model: ModelDescriptor): string {
  const parts: string[] = [
    `**${model.displayName}**`,
    `  - **Model ID:** \`${model.id}\` (use this exact ID as \`model\`)`,
  ];
  if (model.description) parts.push(`  - Description: ${model.description}`);
  if (model.inputTokenLimit) {
    parts.push(`  - Input Limit: ${model.inputTokenLimit.toLocaleString()} tokens`);
  }
  if (model.outputTokenLimit) {
    parts.push(`  - Output Limit: ${model.outputTokenLimit.toLocaleString()} tokens`);
  }
  return parts.join('\n');
}

export function formatDatasetEntry(entry: DatasetHistoryEntry): string {
  const star = entry.isFavorite ? ' ★' : '';
  return `**${entry.name}**${star}
  - **Dataset ID:** \`${entry.id}\`
  - Columns (${entry.columns.length}): ${entry.columns.join(', ')}
  - Rows: ${entry.rowCount}
  - Used ${entry.usageCount} time(s), last ${entry.lastUsed.toISOString()}`;
}

export function formatQuerySummary(query: QuerySummary): string {
  const status =
    query.executionSuccess === null ? 'not executed' : query.executionSuccess ? 'succeeded' : 'failed';
  const dataset = query.datasetName ? ` on ${query.datasetName}` : '';
  return `- \`${query.id}\` ${query.timestamp.toISOString()}${dataset} (${status}): ${query.question}`;
}

/** Output block plus a failure line; the traceback is kept intact. */
export function formatExecution(result: ExecutionResult): string {
  const parts: string[] = [];
  if (result.success) {
    parts.push(`Execution succeeded in ${result.durationMs}ms.`);
  } else {
    const type = result.errorType ? ` (${result.errorType})` : '';
    parts.push(`Execution failed: ${result.reason}${type} after ${result.durationMs}ms.`);
  }
  if (result.output) {
    parts.push(`\n## Output\n\n\`\`\`\n${result.output}\n\`\`\``);
  }
  parts.push(result.chartExists ? '\nA chart was produced.' : '\nNo chart was produced.');
  return parts.join('\n');
}

export function formatQueryDetails(query: QueryDetails): string {
  const parts: string[] = [
    `# Query ${query.id}`,
    `- Question: ${query.question}`,
    `- Dataset: ${query.datasetName ?? 'none'}`,
    `- Model: ${query.model ?? 'unknown'}`,
    `- Logged: ${query.timestamp.toISOString()}`,
    `\n## Code\n\n\`\`\`python\n${query.generatedCode}\n\`\`\``,
  ];
  if (query.execution) {
    const status = query.execution.success ? 'succeeded' : 'failed';
    parts.push(
      `\n## Execution\n\n${status} in ${query.execution.durationMs}ms at ${query.execution.executedAt.toISOString()}`,
    );
    if (query.execution.output) {
      parts.push(`\n\`\`\`\n${query.execution.output}\n\`\`\``);
    }
  } else {
    parts.push('\nNot executed yet.');
  }
  return parts.join('\n');
}
