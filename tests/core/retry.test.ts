import { describe, it, expect, vi } from 'vitest';
import { computeDelay, createRetryPolicy, sleep, withRetry } from '../../src/core/retry.js';
import { AuthError, CancelledError, TransientError } from '../../src/core/errors.js';

const fast = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 });

describe('computeDelay', () => {
  it('doubles from the base delay up to the cap', () => {
    const policy = createRetryPolicy({ maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 8000 });
    expect([1, 2, 3, 4, 5, 6].map(n => computeDelay(n, policy))).toEqual([500, 1000, 2000, 4000, 8000, 8000]);
  });
});

describe('createRetryPolicy', () => {
  it('always allows at least one attempt', () => {
    expect(createRetryPolicy({ maxAttempts: 0, baseDelayMs: -5, maxDelayMs: 10 })).toMatchObject({
      maxAttempts: 1,
      baseDelayMs: 0,
      maxDelayMs: 10,
    });
  });
});

describe('withRetry', () => {
  it('retries transient failures until one succeeds', async () => {
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new TransientError('busy', 'openai');
      return 'done';
    });
    const onRetry = vi.fn();

    await expect(withRetry(operation, fast, { onRetry })).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([event]) => event.attempt)).toEqual([1, 2]);
  });

  it('gives up after the last attempt with the last error', async () => {
    const operation = vi.fn(async (attempt: number) => {
      throw new TransientError(`busy ${attempt}`, 'openai');
    });

    await expect(withRetry(operation, fast)).rejects.toThrow('busy 3');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry other kinds of failure', async () => {
    const operation = vi.fn(async () => {
      throw new AuthError('bad key', 'openai');
    });

    await expect(withRetry(operation, fast)).rejects.toBeInstanceOf(AuthError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'never');

    await expect(withRetry(operation, fast, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(operation).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('rejects when aborted mid-wait', async () => {
    const controller = new AbortController();
    const waiting = sleep(60_000, controller.signal);
    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
  });
});
