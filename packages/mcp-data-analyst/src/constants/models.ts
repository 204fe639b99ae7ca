/** Generation method a model must advertise to be usable for code generation. */
export const GENERATION_METHOD = 'generateContent';

/** Used when the provider listing fails or returns nothing usable. */
export const DEFAULT_MODEL_ID = 'gemini-2.0-flash';

/**
 * Preferred models, fastest first. The first entry that the provider lists as
 * supporting `generateContent` wins; otherwise the first listed model is used.
 */
export const MODEL_PRIORITY = [
  'gemini-2.0-flash',
  'gemini-2.5-flash',
  'gemini-flash-latest',
  'gemini-2.0-flash-001',
  'gemini-2.5-pro',
  'gemini-pro-latest',
] as const;

/** Provider ids are returned as `models/<id>`; requests take the bare id. */
export const MODEL_NAME_PREFIX = 'models/';

export function toModelId(name: string): string {
  return name.startsWith(MODEL_NAME_PREFIX) ? name.slice(MODEL_NAME_PREFIX.length) : name;
}
