#!/usr/bin/env tsx

import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { loadConfig, SERVER_INSTRUCTIONS, SERVER_NAME, SERVER_VERSION, type AppConfig } from './config.ts';
import { createHistoryStore } from './history/index.ts';
import type { HistoryStore } from './history/types.ts';
import { registerPrompts } from './prompts/index.ts';
import { setupApiRoutes } from './routes/api-routes.ts';
import {
  AnalyzeDatasetSchema,
  CleanupSchema,
  DatasetIdSchema,
  GenerateCodeFields,
  LimitSchema,
  QueryIdSchema,
} from './schemas/analysis.schema.ts';
import { AnalystService } from './services/analyst-service.ts';
import { CodeExecutor, PythonRuntime } from './services/code-executor.ts';
import { CodeGenerator } from './services/code-generator.ts';
import { DatasetRepository } from './services/dataset-repository.ts';
import { GeminiClient } from './services/gemini.ts';
import type { ModelProvider } from './services/model-provider.ts';
import { analyzeDataset, executeQuery, generateCode, listModels } from './tools/analysis.ts';
import {
  cleanupDatasets,
  getQuery,
  listDatasetHistory,
  listRecentQueries,
  toggleFavorite,
} from './tools/history.ts';
import { setupGracefulShutdown, setupMcpEndpoints } from './utils/http-server.ts';
import { logger } from './utils/logger.ts';
import { withToolErrorHandler } from './utils/tool-handler.ts';

/** Wires the service from configuration; the provider is injectable for tests. */
export function createAnalystService(
  config: AppConfig,
  history: HistoryStore,
  provider: ModelProvider = new GeminiClient(config.model.apiKey, {
    baseUrl: config.model.baseUrl,
    timeoutMs: config.model.timeoutMs,
  }),
): AnalystService {
  const generator = new CodeGenerator(provider, {
    maxAttempts: config.model.maxAttempts,
    preferredModel: config.model.preferredModel,
    fallbackModel: config.model.defaultModel,
    chartFilename: config.execution.chartFilename,
  });
  const executor = new CodeExecutor(new PythonRuntime(config.execution.pythonBin), {
    workDir: config.execution.workDir,
    timeoutMs: config.execution.timeoutMs,
    maxOutputBytes: config.execution.maxOutputBytes,
    chartFilename: config.execution.chartFilename,
  });
  return new AnalystService({
    provider,
    generator,
    executor,
    history,
    datasets: new DatasetRepository(config.dataDir),
    staleAfterDays: config.history.staleAfterDays,
  });
}

export function createMcpServer(service: AnalystService): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  server.registerTool(
    'analyze_dataset',
    {
      description: 'Answer a natural-language question about a registered dataset. Generates pandas/matplotlib code, runs it in an isolated process and returns the printed answer, the chart image and the code.',
      inputSchema: AnalyzeDatasetSchema.shape,
    },
    withToolErrorHandler('analyze_dataset', (args) => analyzeDataset(args, service)),
  );

  server.registerTool(
    'generate_code',
    {
      description: 'Generate analysis code for a question without running it. Give dataset_name to bind it to a registered dataset (then run it with execute_query), or only columns to get code for review.',
      inputSchema: GenerateCodeFields.shape,
    },
    withToolErrorHandler('generate_code', (args) => generateCode(args, service)),
  );

  server.registerTool(
    'execute_query',
    {
      description: 'Run the code of a query created by generate_code against its dataset. Returns output, traceback on failure, and the chart image. Each query runs once.',
      inputSchema: QueryIdSchema.shape,
    },
    withToolErrorHandler('execute_query', (args) => executeQuery(args, service)),
  );

  server.registerTool(
    'list_models',
    {
      description: 'List the models that can generate analysis code. Use an ID from here as the optional model parameter.',
      inputSchema: {},
    },
    withToolErrorHandler('list_models', () => listModels(service)),
  );

  server.registerTool(
    'list_dataset_history',
    {
      description: 'List registered datasets, most recently used first, with their columns and row counts.',
      inputSchema: LimitSchema.shape,
    },
    withToolErrorHandler('list_dataset_history', (args) => listDatasetHistory(args, service)),
  );

  server.registerTool(
    'toggle_favorite',
    {
      description: 'Mark or unmark a dataset as favorite. Favorites are kept by cleanup_datasets.',
      inputSchema: DatasetIdSchema.shape,
    },
    withToolErrorHandler('toggle_favorite', (args) => toggleFavorite(args, service)),
  );

  server.registerTool(
    'cleanup_datasets',
    {
      description: 'Remove non-favorite datasets that have not been used for a number of days.',
      inputSchema: CleanupSchema.shape,
    },
    withToolErrorHandler('cleanup_datasets', (args) => cleanupDatasets(args, service)),
  );

  server.registerTool(
    'list_recent_queries',
    {
      description: 'List recently logged queries with their execution status.',
      inputSchema: LimitSchema.shape,
    },
    withToolErrorHandler('list_recent_queries', (args) => listRecentQueries(args, service)),
  );

  server.registerTool(
    'get_query',
    {
      description: 'Show the question, generated code and execution output of a logged query.',
      inputSchema: QueryIdSchema.shape,
    },
    withToolErrorHandler('get_query', (args) => getQuery(args, service)),
  );

  registerPrompts(server);

  server.registerResource(
    'info',
    'data-analyst://info',
    {
      description: 'Information about the data analyst MCP server',
      mimeType: 'application/json',
    },
    async () => ({
      contents: [
        {
          uri: 'data-analyst://info',
          mimeType: 'application/json',
          text: JSON.stringify(
            {
              name: SERVER_NAME,
              version: SERVER_VERSION,
              description: 'MCP Server answering questions about tabular datasets with generated pandas code',
              tools: [
                'analyze_dataset',
                'generate_code',
                'execute_query',
                'list_models',
                'list_dataset_history',
                'toggle_favorite',
                'cleanup_datasets',
                'list_recent_queries',
                'get_query',
              ],
              uptime: process.uptime(),
              nodeVersion: process.version,
            },
            null,
            2,
          ),
        },
      ],
    }),
  );

  return server;
}

export function createApp(
  service: AnalystService,
  transports: Map<string, StreamableHTTPServerTransport> = new Map(),
): express.Application {
  const app = express();
  app.disable('x-powered-by');

  const createSession = () => {
    const server = createMcpServer(service);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableJsonResponse: true,
      onsessioninitialized: (sessionId: string) => {
        logger.info({ sessionId, totalSessions: transports.size + 1 }, 'Session initialized');
        transports.set(sessionId, transport);
      },
    });

    server.server.onclose = () => {
      const sid = transport.sessionId;
      if (sid && transports.has(sid)) {
        logger.info({ sessionId: sid, totalSessions: transports.size - 1 }, 'Session closed');
        transports.delete(sid);
      }
    };

    return { server, transport };
  };

  setupMcpEndpoints(app, {
    serverName: SERVER_NAME,
    version: SERVER_VERSION,
    transports,
    createSession,
    logger,
  });
  setupApiRoutes(app, service);

  return app;
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.model.apiKey) {
    logger.warn('GOOGLE_API_KEY or GEMINI_API_KEY is not set; code generation requests will fail');
  }

  const history = await createHistoryStore(config.history);
  const service = createAnalystService(config, history);
  const transports = new Map<string, StreamableHTTPServerTransport>();
  const app = createApp(service, transports);

  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info(
      { port: config.port, history: config.history.backend, workDir: config.execution.workDir },
      'Data Analyst MCP Server started',
    );
  });

  setupGracefulShutdown(server, transports, logger, () => history.close());
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    logger.error({ error }, 'Fatal error');
    process.exit(1);
  });
}
