import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  OVERLOADED_MESSAGE,
  createGenerationGateway,
  isOverloadError,
  type RetryPolicy,
} from '../../lib/generation';
import type { CompletionParams, TextGenerator } from '../../lib/openai';

const retryPolicy: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: (attempt) => 5000 * 2 ** attempt,
};

function overloaded(status = 529): Error {
  return Object.assign(new Error('Overloaded'), { status });
}

function setup(complete: (params: CompletionParams) => Promise<string>) {
  const generator: TextGenerator = { complete: vi.fn(complete) };
  const sleep = vi.fn(async (_ms: number) => {});
  const notices: string[] = [];
  const gateway = createGenerationGateway({
    generator,
    retryPolicy,
    sleep,
    onNotice: (message) => notices.push(message),
    temperature: 0.5,
  });
  return { gateway, generator, sleep, notices };
}

describe('generation gateway', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('returns trimmed text from a single call', async () => {
    const { gateway, generator, sleep } = setup(async () => '  Generated article  \n');

    const result = await gateway.generate('Write something', 500);

    expect(result).toEqual({ ok: true, text: 'Generated article' });
    expect(generator.complete).toHaveBeenCalledWith({ prompt: 'Write something', maxTokens: 500, temperature: 0.5 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('backs off exponentially while the service is overloaded', async () => {
    let attempts = 0;
    const { gateway, generator, sleep, notices } = setup(async () => {
      attempts += 1;
      if (attempts < 3) throw overloaded();
      return 'Recovered';
    });

    const result = await gateway.generate('prompt', 8000);

    expect(result).toEqual({ ok: true, text: 'Recovered' });
    expect(generator.complete).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[5000], [10000]]);
    expect(notices).toEqual([
      'The text generation service is overloaded. Waiting 5 seconds before retry...',
      'The text generation service is overloaded. Waiting 10 seconds before retry...',
    ]);
  });

  it('reports an overload failure after the last attempt without a trailing sleep', async () => {
    const { gateway, generator, sleep } = setup(async () => {
      throw overloaded(503);
    });

    const result = await gateway.generate('prompt', 8000);

    expect(result).toEqual({ ok: false, failure: { kind: 'overloaded', message: OVERLOADED_MESSAGE } });
    expect(generator.complete).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('fails immediately on errors that are not overloads', async () => {
    const { gateway, generator, sleep } = setup(async () => {
      throw Object.assign(new Error('Invalid API key'), { status: 401 });
    });

    const result = await gateway.generate('prompt', 8000);

    expect(result).toEqual({ ok: false, failure: { kind: 'error', message: 'Invalid API key' } });
    expect(generator.complete).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('treats an empty completion as a failure', async () => {
    const { gateway } = setup(async () => '   ');

    const result = await gateway.generate('prompt', 100);

    expect(result).toEqual({ ok: false, failure: { kind: 'error', message: 'Model returned no content' } });
  });

  it('honours per-call temperature and attempt overrides', async () => {
    const { gateway, generator, sleep } = setup(async () => {
      throw overloaded();
    });

    const result = await gateway.generate('title prompt', 100, { temperature: 0.9, maxAttempts: 1 });

    expect(result.ok).toBe(false);
    expect(generator.complete).toHaveBeenCalledWith({ prompt: 'title prompt', maxTokens: 100, temperature: 0.9 });
    expect(generator.complete).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('isOverloadError', () => {
  it('recognises overload statuses and messages', () => {
    expect(isOverloadError({ status: 529 })).toBe(true);
    expect(isOverloadError(new Error('Request failed with status 503'))).toBe(true);
    expect(isOverloadError(new Error('The engine is currently overloaded'))).toBe(true);
  });

  it('rejects other failures', () => {
    expect(isOverloadError({ status: 500 })).toBe(false);
    expect(isOverloadError(new Error('Request failed with status 400'))).toBe(false);
    expect(isOverloadError('timeout')).toBe(false);
  });
});
