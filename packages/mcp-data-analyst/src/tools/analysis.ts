import type { TextContent, ImageContent } from '@modelcontextprotocol/sdk/types.js';
import { AnalyzeDatasetSchema, GenerateCodeSchema, QueryIdSchema } from '../schemas/analysis.schema.ts';
import type { AnalystService } from '../services/analyst-service.ts';
import type { ExecutionResult } from '../services/code-executor.ts';
import { logger } from '../utils/logger.ts';
import { formatExecution, formatModel } from '../utils/model-formatting.ts';

type AnalysisToolResult = { content: Array<TextContent | ImageContent> };

async function chartContent(
  queryId: string,
  execution: ExecutionResult,
  service: AnalystService,
): Promise<ImageContent[]> {
  if (!execution.chartExists) return [];
  const chart = await service.readChart(queryId);
  return [{ type: 'image', data: chart.toString('base64'), mimeType: 'image/png' }];
}

export async function analyzeDataset(
  input: unknown,
  service: AnalystService,
): Promise<AnalysisToolResult> {
  const { dataset_name, question, model } = AnalyzeDatasetSchema.parse(input);
  logger.info({ dataset: dataset_name, hasModel: !!model }, 'Analyzing dataset');

  const outcome = await service.analyze(dataset_name, question, model);
  const text = [
    `Query \`${outcome.queryId}\` (model ${outcome.model}, generated in ${outcome.durationMs}ms)`,
    formatExecution(outcome.execution),
    `\n## Code\n\n\`\`\`python\n${outcome.code}\n\`\`\``,
  ].join('\n\n');

  return {
    content: [{ type: 'text', text }, ...(await chartContent(outcome.queryId, outcome.execution, service))],
  };
}

export async function generateCode(
  input: unknown,
  service: AnalystService,
): Promise<{ content: TextContent[] }> {
  const { columns, question, dataset_name, model } = GenerateCodeSchema.parse(input);
  logger.info({ dataset: dataset_name, columns: columns?.length }, 'Generating code');

  const outcome = await service.generateCode({ columns, question, datasetName: dataset_name, model });
  const runHint = dataset_name
    ? `Run it with \`execute_query\` and query_id \`${outcome.queryId}\`.`
    : 'It was generated without a dataset, so it cannot be executed here.';

  return {
    content: [
      {
        type: 'text',
        text: `Query \`${outcome.queryId}\` (model ${outcome.model}, ${outcome.durationMs}ms). ${runHint}\n\n\`\`\`python\n${outcome.code}\n\`\`\``,
      },
    ],
  };
}

export async function executeQuery(
  input: unknown,
  service: AnalystService,
): Promise<AnalysisToolResult> {
  const { query_id } = QueryIdSchema.parse(input);
  const { execution } = await service.executeQuery(query_id);
  return {
    content: [
      { type: 'text', text: formatExecution(execution) },
      ...(await chartContent(query_id, execution, service)),
    ],
  };
}

export async function listModels(service: AnalystService): Promise<{ content: TextContent[] }> {
  const models = await service.listModels();
  if (models.length === 0) {
    return {
      content: [
        {
          type: 'text',
          text: 'No code generation models found. This may indicate an API error or connectivity issue.',
        },
      ],
    };
  }
  return {
    content: [
      {
        type: 'text',
        text: `# Available Models\n\nFound ${models.length} model(s):\n\n${models.map(formatModel).join('\n\n')}`,
      },
    ],
  };
}
