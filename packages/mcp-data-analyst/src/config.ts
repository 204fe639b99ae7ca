/**
 * Server and runtime configuration.
 * Environment variables are parsed once at startup into an AppConfig that is
 * passed down explicitly; nothing below reads process.env on its own.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_MODEL_ID } from './constants/models.ts';

export const SERVER_NAME = 'data-analyst-mcp-server';
export const SERVER_VERSION = '1.0.0';

/** File name the generated code must write its chart to, relative to the run directory. */
export const CHART_FILENAME = 'output.png';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: intFromEnv(3020),
  GOOGLE_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  GEMINI_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
  GEMINI_MODEL: optionalString,
  MODEL_TIMEOUT_MS: intFromEnv(60_000),
  MODEL_MAX_ATTEMPTS: intFromEnv(2),
  PYTHON_BIN: z.string().min(1).default('python3'),
  EXECUTION_TIMEOUT_MS: intFromEnv(30_000),
  EXECUTION_MAX_OUTPUT_BYTES: intFromEnv(1024 * 1024),
  WORK_DIR: z.string().min(1).default('./data/runs'),
  DATA_DIR: z.string().min(1).default('./data/datasets'),
  HISTORY_BACKEND: z.enum(['mongo', 'memory']).default('mongo'),
  MONGO_URI: z.string().min(1).default('mongodb://127.0.0.1:27017/data-analyst'),
  STALE_DATASET_DAYS: intFromEnv(30),
});

export interface AppConfig {
  port: number;
  model: {
    apiKey: string | undefined;
    baseUrl: string;
    /** Explicit model override (GEMINI_MODEL); honored before automatic selection. */
    preferredModel: string | undefined;
    defaultModel: string;
    timeoutMs: number;
    maxAttempts: number;
  };
  execution: {
    pythonBin: string;
    timeoutMs: number;
    maxOutputBytes: number;
    workDir: string;
    chartFilename: string;
  };
  dataDir: string;
  history: {
    backend: 'mongo' | 'memory';
    mongoUri: string;
    staleAfterDays: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    model: {
      apiKey: parsed.GOOGLE_API_KEY ?? parsed.GEMINI_API_KEY,
      baseUrl: parsed.GEMINI_BASE_URL,
      preferredModel: parsed.GEMINI_MODEL,
      defaultModel: DEFAULT_MODEL_ID,
      timeoutMs: parsed.MODEL_TIMEOUT_MS,
      maxAttempts: parsed.MODEL_MAX_ATTEMPTS,
    },
    execution: {
      pythonBin: parsed.PYTHON_BIN,
      timeoutMs: parsed.EXECUTION_TIMEOUT_MS,
      maxOutputBytes: parsed.EXECUTION_MAX_OUTPUT_BYTES,
      workDir: resolve(parsed.WORK_DIR),
      chartFilename: CHART_FILENAME,
    },
    dataDir: resolve(parsed.DATA_DIR),
    history: {
      backend: parsed.HISTORY_BACKEND,
      mongoUri: parsed.MONGO_URI,
      staleAfterDays: parsed.STALE_DATASET_DAYS,
    },
  };
}

/** MCP server instructions for the agent. */
export const SERVER_INSTRUCTIONS = `You have access to a data analysis server that answers questions about tabular datasets.

Usage:
- Use list_dataset_history to see which datasets are registered (most recently used first).
- Use analyze_dataset with a dataset name and a natural-language question. It generates pandas/matplotlib code, runs it in an isolated process and returns the printed answer plus a chart image.
- Use generate_code when you only need the code (e.g. to review it), then execute_query with the returned query_id to run it.
- A failed execution returns the full traceback. Refine the question and call analyze_dataset again; failed code is never retried automatically.
- Use get_query to re-read the code and output of an earlier query.`;
