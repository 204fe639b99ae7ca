import { logger } from '../utils/logger.ts';
import { withRetry } from '../utils/retry.ts';
import {
  EmptyModelResponseError,
  ModelRetriesExhaustedError,
  ModelUnavailableError,
  errorMessage,
} from '../utils/errors.ts';
import { sanitizeGeneratedCode } from '../utils/code-sanitizer.ts';
import { selectModel, type SelectModelOptions } from './model-selector.ts';
import type { ModelProvider } from './model-provider.ts';

export interface CodeGeneratorOptions {
  /** Total model calls allowed per generation, including the first. */
  maxAttempts?: number;
  /** Override from configuration (GEMINI_MODEL). */
  preferredModel?: string;
  fallbackModel?: string;
  chartFilename?: string;
}

export interface GenerateCodeRequest {
  prompt: string;
  /** Per-request override; takes precedence over the configured one. */
  model?: string;
}

export interface GeneratedCode {
  code: string;
  rawText: string;
  model: string;
  attempts: number;
}

/**
 * Turns a prompt into sanitized analysis code.
 *
 * Only ModelUnavailableError is retried: the model is re-selected from the
 * provider listing (without the override, which is what just failed) and the
 * call repeated, up to maxAttempts calls in total.
 */
export class CodeGenerator {
  private readonly maxAttempts: number;

  constructor(
    private readonly provider: ModelProvider,
    private readonly options: CodeGeneratorOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
  }

  async generate(request: GenerateCodeRequest): Promise<GeneratedCode> {
    const selection: SelectModelOptions = { fallback: this.options.fallbackModel };
    let { model } = await selectModel(this.provider, {
      ...selection,
      preferred: request.model ?? this.options.preferredModel,
    });
    let attempts = 0;

    const rawText = await withRetry(
      async (attempt) => {
        attempts = attempt;
        return this.provider.generateText({ prompt: request.prompt, model });
      },
      {
        attempts: this.maxAttempts,
        isRetryable: (error) => error instanceof ModelUnavailableError,
        onRetry: async (error, attempt) => {
          logger.warn(
            { model, attempt, maxAttempts: this.maxAttempts, error: errorMessage(error) },
            'Model unavailable, re-selecting',
          );
          ({ model } = await selectModel(this.provider, selection));
          logger.info({ model }, 'Retrying with model');
        },
        onExhausted: (error, total) => new ModelRetriesExhaustedError(total, errorMessage(error)),
      },
    );

    if (!rawText.trim()) {
      throw new EmptyModelResponseError(model);
    }

    const code = sanitizeGeneratedCode(rawText, { chartFilename: this.options.chartFilename });
    if (!code) {
      throw new EmptyModelResponseError(model);
    }

    logger.info({ model, attempts, codeLength: code.length }, 'Generated analysis code');
    return { code, rawText, model, attempts };
  }
}
