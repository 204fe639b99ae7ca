import { z } from 'zod';
import { toModelId } from '../constants/models.ts';

/** Listing entry as returned by the provider; validated before use. */
export const ModelEntrySchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
  description: z.string().optional(),
  supportedGenerationMethods: z.array(z.string()).default([]),
  inputTokenLimit: z.number().int().optional(),
  outputTokenLimit: z.number().int().optional(),
});

export interface ModelDescriptor {
  /** Bare id accepted by generateText (no `models/` prefix). */
  id: string;
  displayName: string;
  description?: string;
  supportedGenerationMethods: string[];
  inputTokenLimit?: number;
  outputTokenLimit?: number;
}

export function toModelDescriptor(entry: z.infer<typeof ModelEntrySchema>): ModelDescriptor {
  const id = toModelId(entry.name);
  return {
    id,
    displayName: entry.displayName ?? id,
    description: entry.description,
    supportedGenerationMethods: entry.supportedGenerationMethods,
    inputTokenLimit: entry.inputTokenLimit,
    outputTokenLimit: entry.outputTokenLimit,
  };
}

export interface GenerateTextRequest {
  prompt: string;
  model: string;
}

/**
 * A generative text model provider. Implementations throw the classified errors
 * from utils/errors.ts: ModelUnavailableError for unknown/unservable model ids,
 * ConfigurationError for credential problems, ModelTimeoutError and
 * ModelCallError for everything else.
 */
export interface ModelProvider {
  listModels(): Promise<ModelDescriptor[]>;
  generateText(request: GenerateTextRequest): Promise<string>;
}
