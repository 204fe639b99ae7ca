import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger.ts';
import {
  ConfigurationError,
  DataAnalystError,
  ModelCallError,
  ModelTimeoutError,
  ModelUnavailableError,
} from '../utils/errors.ts';
import {
  ModelEntrySchema,
  toModelDescriptor,
  type GenerateTextRequest,
  type ModelDescriptor,
  type ModelProvider,
} from './model-provider.ts';

// --- Gemini API response shapes ----------------------------------------------

const ModelListResponseSchema = z.object({
  models: z.array(z.unknown()).default([]),
  nextPageToken: z.string().optional(),
});

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() }).passthrough()).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

const ApiErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

type GenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;

// --- Helpers ------------------------------------------------------------------

const MAX_LIST_PAGES = 10;
const NOT_FOUND_PATTERN = /not found|is not supported for generatecontent/i;
const INVALID_KEY_PATTERN = /api[_ ]key[_ ]invalid|api key not valid|permission[_ ]denied/i;

function parseAxiosError(error: unknown): {
  message: string;
  status?: number;
  timedOut: boolean;
} {
  if (!axios.isAxiosError(error)) {
    return {
      message: error instanceof Error ? error.message : String(error),
      timedOut: false,
    };
  }
  const body = ApiErrorBodySchema.safeParse(error.response?.data);
  const message = body.success && body.data.error.message ? body.data.error.message : error.message;
  const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
  return { message, status: error.response?.status, timedOut };
}

/** Maps a failed call onto the error taxonomy. `model` is the id the call was for. */
export function classifyGeminiError(error: unknown, model: string, timeoutMs: number): DataAnalystError {
  if (error instanceof DataAnalystError) return error;

  const { message, status, timedOut } = parseAxiosError(error);
  if (timedOut) {
    return new ModelTimeoutError(model, timeoutMs);
  }
  if (status === 401 || status === 403 || INVALID_KEY_PATTERN.test(message)) {
    return new ConfigurationError(`Gemini rejected the API key: ${message}`);
  }
  if (status === 404 || NOT_FOUND_PATTERN.test(message)) {
    return new ModelUnavailableError(model, `Model "${model}" is not available: ${message}`);
  }
  return new ModelCallError(`Gemini API error: ${message}`, status);
}

function extractText(response: GenerateContentResponse): string {
  const blockReason = response.promptFeedback?.blockReason;
  if (blockReason) {
    throw new ModelCallError(`Gemini blocked the prompt: ${blockReason}`);
  }
  const parts = response.candidates[0]?.content?.parts ?? [];
  return parts.map((p) => p.text ?? '').join('');
}

// --- Client -------------------------------------------------------------------

export interface GeminiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport; used by tests. */
  adapter?: AxiosAdapter;
}

export class GeminiClient implements ModelProvider {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string | undefined,
    options: GeminiClientOptions = {},
  ) {
    const baseUrl = (options.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta').replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.client = axios.create({
      baseURL: baseUrl,
      headers: {
        'x-goog-api-key': apiKey ?? '',
        'Content-Type': 'application/json',
      },
      timeout: this.timeoutMs,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async listModels(): Promise<ModelDescriptor[]> {
    this.ensureApiKey();

    const models: ModelDescriptor[] = [];
    let pageToken: string | undefined;
    try {
      for (let page = 0; page < MAX_LIST_PAGES; page++) {
        const res = await this.client.get<unknown>('/models', {
          params: { pageSize: 1000, ...(pageToken ? { pageToken } : {}) },
        });
        const body = ModelListResponseSchema.parse(res.data);
        for (const raw of body.models) {
          const entry = ModelEntrySchema.safeParse(raw);
          if (entry.success) {
            models.push(toModelDescriptor(entry.data));
          } else {
            logger.warn({ issues: entry.error.issues.length }, 'Skipping malformed model entry');
          }
        }
        pageToken = body.nextPageToken;
        if (!pageToken) break;
      }
    } catch (error) {
      const classified = classifyGeminiError(error, 'models', this.timeoutMs);
      logger.error({ error: classified.message }, 'Error listing models');
      throw classified;
    }
    return models;
  }

  async generateText({ prompt, model }: GenerateTextRequest): Promise<string> {
    this.ensureApiKey();

    logger.debug({ model, promptLength: prompt.length }, 'Generating content');

    try {
      const res = await this.client.post<unknown>(`/models/${encodeURIComponent(model)}:generateContent`, {
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
      });
      const parsed = GenerateContentResponseSchema.safeParse(res.data);
      if (!parsed.success) {
        throw new ModelCallError('Gemini returned an unexpected response shape');
      }
      return extractText(parsed.data);
    } catch (error) {
      const classified = classifyGeminiError(error, model, this.timeoutMs);
      logger.error({ error: classified.message, code: classified.code, model }, 'Error generating content');
      throw classified;
    }
  }

  private ensureApiKey(): void {
    if (!this.apiKey) {
      throw new ConfigurationError('GOOGLE_API_KEY or GEMINI_API_KEY environment variable is required');
    }
  }
}
