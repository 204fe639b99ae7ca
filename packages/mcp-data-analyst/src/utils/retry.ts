/**
 * Retry an async operation a bounded number of times.
 * The caller decides which errors are worth another attempt and may adjust
 * its own state (e.g. pick another model) before the next one.
 */

const DEFAULT_ATTEMPTS = 2;
const DEFAULT_DELAY_MS = 0;

export interface RetryOptions {
  /** Max number of attempts, including the first (default 2). */
  attempts?: number;
  /** Delay in ms between attempts (default 0). */
  delayMs?: number;
  /** Return true if the error is worth another attempt (default: never). */
  isRetryable?: (error: unknown) => boolean;
  /** Called after a retryable failure, before the next attempt. */
  onRetry?: (error: unknown, attempt: number) => void | Promise<void>;
  /** Called when the last permitted attempt failed with a retryable error. */
  onExhausted?: (error: unknown, attempts: number) => unknown;
}

/**
 * Run `fn` with the 1-based attempt number; on a retryable failure, wait and try again.
 * Non-retryable errors are rethrown immediately.
 * @returns Result of the first successful attempt
 * @throws The last error, or whatever `onExhausted` returns, once attempts run out
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_ATTEMPTS);
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
  const isRetryable = options.isRetryable ?? (() => false);

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt === attempts) {
        throw options.onExhausted ? options.onExhausted(error, attempts) : error;
      }
      await options.onRetry?.(error, attempt);
      if (delayMs > 0) {
        await new Promise((r) => setTimeout(r, delayMs));
      }
    }
  }
  throw lastError;
}
