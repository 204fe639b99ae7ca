import { logger } from '../utils/logger.ts';
import { errorMessage } from '../utils/errors.ts';
import { DEFAULT_MODEL_ID, GENERATION_METHOD, MODEL_PRIORITY } from '../constants/models.ts';
import type { ModelDescriptor, ModelProvider } from './model-provider.ts';

export type ModelSelectionSource = 'override' | 'priority' | 'first-available' | 'fallback';

export interface ModelSelection {
  model: string;
  source: ModelSelectionSource;
}

export interface SelectModelOptions {
  /** Explicit choice from the caller or environment; wins when the provider lists it. */
  preferred?: string;
  priority?: readonly string[];
  fallback?: string;
}

export function supportsGeneration(model: ModelDescriptor): boolean {
  return model.supportedGenerationMethods.includes(GENERATION_METHOD);
}

/**
 * Lists the provider's generation-capable models, or null when the listing
 * itself failed. A failed listing is not fatal; selection falls back instead.
 */
async function listGenerationModels(provider: ModelProvider): Promise<string[] | null> {
  try {
    const models = await provider.listModels();
    return models.filter(supportsGeneration).map((m) => m.id);
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Could not list models; using fallback model');
    return null;
  }
}

/**
 * Picks a model id. Order: explicit override (unless the listing shows it is
 * missing), then the priority list, then the first listed model, then the
 * hardcoded fallback when the listing failed or was empty.
 */
export async function selectModel(
  provider: ModelProvider,
  options: SelectModelOptions = {},
): Promise<ModelSelection> {
  const priority = options.priority ?? MODEL_PRIORITY;
  const fallback = options.fallback ?? DEFAULT_MODEL_ID;
  const available = await listGenerationModels(provider);

  if (options.preferred) {
    if (!available || available.length === 0 || available.includes(options.preferred)) {
      logger.info({ model: options.preferred }, 'Using requested model');
      return { model: options.preferred, source: 'override' };
    }
    logger.warn({ model: options.preferred }, 'Requested model not available, auto-selecting');
  }

  if (!available || available.length === 0) {
    logger.warn({ model: fallback }, 'No models listed, using default');
    return { model: fallback, source: 'fallback' };
  }

  const preferred = priority.find((id) => available.includes(id));
  if (preferred) {
    logger.info({ model: preferred }, 'Selected model');
    return { model: preferred, source: 'priority' };
  }

  logger.warn({ model: available[0] }, 'Using first available model');
  return { model: available[0], source: 'first-available' };
}
