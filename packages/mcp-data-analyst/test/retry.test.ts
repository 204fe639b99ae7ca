import { describe, it, expect, vi } from 'vitest';
import { withRetry } from '../src/utils/retry.ts';

class Transient extends Error {}

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'ok');
    await expect(withRetry(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('retries a retryable failure and reports it', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt === 1) throw new Transient('first');
      return `attempt ${attempt}`;
    });
    const onRetry = vi.fn();

    const result = await withRetry(fn, {
      attempts: 3,
      isRetryable: (error) => error instanceof Transient,
      onRetry,
    });

    expect(result).toBe('attempt 2');
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][1]).toBe(1);
  });

  it('rethrows a non-retryable failure at once', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });
    await expect(withRetry(fn, { attempts: 5, isRetryable: (e) => e instanceof Transient })).rejects.toThrow(
      'fatal',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws what onExhausted returns after the last attempt', async () => {
    const fn = vi.fn(async () => {
      throw new Transient('again');
    });
    const exhausted = withRetry(fn, {
      attempts: 3,
      isRetryable: () => true,
      onExhausted: (last, attempts) =>
        new Error(`gave up after ${attempts}: ${last instanceof Error ? last.message : String(last)}`),
    });

    await expect(exhausted).rejects.toThrow('gave up after 3: again');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error without onExhausted', async () => {
    let call = 0;
    const fn = async () => {
      call++;
      throw new Transient(`failure ${call}`);
    };
    await expect(withRetry(fn, { attempts: 2, isRetryable: () => true })).rejects.toThrow('failure 2');
  });

  it('makes at least one attempt', async () => {
    const fn = vi.fn(async () => 1);
    await withRetry(fn, { attempts: 0 });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
