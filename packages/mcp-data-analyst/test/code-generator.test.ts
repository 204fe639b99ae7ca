import { describe, it, expect } from 'vitest';
import { CodeGenerator } from '../src/services/code-generator.ts';
import {
  EmptyModelResponseError,
  ModelCallError,
  ModelRetriesExhaustedError,
  ModelUnavailableError,
} from '../src/utils/errors.ts';
import { FakeModelProvider } from './helpers.ts';

describe('CodeGenerator', () => {
  it('returns sanitized code with the selected model', async () => {
    const provider = new FakeModelProvider(undefined, () => "```python\nprint('x')\n```");
    const generator = new CodeGenerator(provider);

    const result = await generator.generate({ prompt: 'p' });

    expect(result).toEqual({
      code: "print('x')",
      rawText: "```python\nprint('x')\n```",
      model: 'gemini-2.0-flash',
      attempts: 1,
    });
    expect(provider.calls).toEqual([{ prompt: 'p', model: 'gemini-2.0-flash' }]);
  });

  it('prefers the request override over the configured one', async () => {
    const provider = new FakeModelProvider();
    const generator = new CodeGenerator(provider, { preferredModel: 'gemini-2.0-flash' });

    await generator.generate({ prompt: 'p', model: 'gemini-2.5-flash' });

    expect(provider.calls[0].model).toBe('gemini-2.5-flash');
  });

  it('re-selects without the override after the model turns out unavailable', async () => {
    const provider = new FakeModelProvider(undefined, (request, call) =>
      call === 1 ? new ModelUnavailableError(request.model) : 'print(1)',
    );
    const generator = new CodeGenerator(provider);

    const result = await generator.generate({ prompt: 'p', model: 'gemini-2.5-flash' });

    expect(provider.calls.map((c) => c.model)).toEqual(['gemini-2.5-flash', 'gemini-2.0-flash']);
    expect(result).toMatchObject({ code: 'print(1)', model: 'gemini-2.0-flash', attempts: 2 });
  });

  it('gives up after maxAttempts unavailable models', async () => {
    const provider = new FakeModelProvider(undefined, (request) => new ModelUnavailableError(request.model));
    const generator = new CodeGenerator(provider, { maxAttempts: 2 });

    const error = await generator.generate({ prompt: 'p' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelRetriesExhaustedError);
    expect(error).toMatchObject({
      attempts: 2,
      message: 'Model selection failed after 2 attempt(s). Last error: Model not available: gemini-2.0-flash',
    });
    expect(provider.calls).toHaveLength(2);
  });

  it('does not retry other model errors', async () => {
    const provider = new FakeModelProvider(undefined, () => new ModelCallError('Gemini API error: quota', 429));
    const generator = new CodeGenerator(provider, { maxAttempts: 3 });

    await expect(generator.generate({ prompt: 'p' })).rejects.toBeInstanceOf(ModelCallError);
    expect(provider.calls).toHaveLength(1);
  });

  it('rejects a blank response without retrying', async () => {
    const provider = new FakeModelProvider(undefined, () => '   \n');
    const generator = new CodeGenerator(provider);

    await expect(generator.generate({ prompt: 'p' })).rejects.toBeInstanceOf(EmptyModelResponseError);
    expect(provider.calls).toHaveLength(1);
  });

  it('rejects a response that is only a code fence', async () => {
    const provider = new FakeModelProvider(undefined, () => '```python\n```');
    const generator = new CodeGenerator(provider);

    await expect(generator.generate({ prompt: 'p' })).rejects.toThrow('Model "gemini-2.0-flash" returned no code');
  });

  it('falls back to the default model when listing fails', async () => {
    const provider = new FakeModelProvider(new Error('offline'));
    const generator = new CodeGenerator(provider, { fallbackModel: 'gemini-2.5-pro' });

    const result = await generator.generate({ prompt: 'p' });

    expect(result.model).toBe('gemini-2.5-pro');
  });
});
