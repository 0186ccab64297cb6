/**
 * Bounded exponential backoff.
 *
 * Only errors the policy calls retryable are tried again (by default,
 * TransientError). Everything else, and the last failure, propagates
 * unchanged.
 */

import type { RetrySettings } from '../types/index.js';
import { CancelledError, isTransientError } from './errors.js';

export interface RetryPolicy extends RetrySettings {
  isRetryable(error: unknown): boolean;
}

export interface RetryEvent {
  /** The attempt that just failed (1-based) */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

export function createRetryPolicy(
  settings: RetrySettings,
  isRetryable: (error: unknown) => boolean = isTransientError
): RetryPolicy {
  return {
    maxAttempts: Math.max(1, Math.floor(settings.maxAttempts)),
    baseDelayMs: Math.max(0, settings.baseDelayMs),
    maxDelayMs: Math.max(0, settings.maxDelayMs),
    isRetryable,
  };
}

/** Wait before attempt n+1: base * 2^(n-1), capped at maxDelayMs. */
export function computeDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/** setTimeout as a promise; an abort rejects with CancelledError. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) throw new CancelledError();

    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        throw error;
      }

      const delayMs = computeDelay(attempt, policy);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}
