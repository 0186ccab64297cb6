/**
 * Shared fetch plumbing for every backend.
 *
 * Combines the caller's cancel signal with the provider's own timeout
 * (when either fires, the fetch aborts and the backend stops work),
 * and turns HTTP failures into the error taxonomy.
 */

import type { z } from 'zod';
import {
  AuthError,
  BackendError,
  CancelledError,
  ModelNotFoundError,
  TransientError,
  type ModelGateError,
} from '../core/errors.js';

export interface HttpOptions {
  /** Provider name for error messages */
  provider: string;
  /** External cancel signal */
  signal?: AbortSignal;
  /** Timeout for this request in ms (0 = none) */
  timeoutMs?: number;
  /** Model being requested, so a 404 can name it */
  model?: string;
}

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

function hasName(value: unknown, name: string): boolean {
  return typeof value === 'object' && value !== null && 'name' in value && value.name === name;
}

export function combineSignals(signal?: AbortSignal, timeoutMs?: number): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (timeoutMs && timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs));
  if (signal) signals.push(signal);

  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

export function classifyStatus(status: number, body: string, opts: HttpOptions): ModelGateError {
  const detail = body.trim().slice(0, 500);
  const message = `${opts.provider} error (${status})${detail ? `: ${detail}` : ''}`;

  if (status === 401 || status === 403) {
    return new AuthError(message, opts.provider);
  }
  if (status === 404) {
    return opts.model
      ? new ModelNotFoundError(opts.model, opts.provider, { cause: new Error(message), status })
      : new BackendError(message, opts.provider, status);
  }
  if (TRANSIENT_STATUSES.has(status) || status >= 500) {
    return new TransientError(message, opts.provider);
  }
  return new BackendError(message, opts.provider, status);
}

export function classifyFetchError(error: unknown, opts: HttpOptions): ModelGateError {
  if (opts.signal?.aborted && !hasName(opts.signal.reason, 'TimeoutError')) {
    return new CancelledError(`${opts.provider} request cancelled`, opts.provider);
  }
  if (hasName(error, 'TimeoutError') || hasName(error, 'AbortError')) {
    return new TransientError(
      `${opts.provider} request timed out after ${opts.timeoutMs ?? 0}ms`,
      opts.provider,
      { cause: error }
    );
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransientError(`${opts.provider} unreachable: ${reason}`, opts.provider, { cause: error });
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

/**
 * fetch() with timeout + cancel, throwing a classified error
 * for network failures and non-2xx statuses.
 */
export async function send(url: string, init: RequestInit, opts: HttpOptions): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      ...init,
      signal: combineSignals(opts.signal, opts.timeoutMs),
    });
  } catch (error) {
    throw classifyFetchError(error, opts);
  }

  if (!response.ok) {
    throw classifyStatus(response.status, await readErrorBody(response), opts);
  }
  return response;
}

/**
 * POST/GET a JSON endpoint and validate the payload shape.
 * A payload that doesn't match is a backend error, not a crash.
 */
export async function sendJson<T extends z.ZodTypeAny>(
  url: string,
  init: RequestInit,
  schema: T,
  opts: HttpOptions
): Promise<z.infer<T>> {
  const response = await send(url, init, opts);

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new BackendError(`${opts.provider} returned a body that is not JSON`, opts.provider, response.status, {
        cause: error,
      });
    }
    throw classifyFetchError(error, opts);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new BackendError(
      `${opts.provider} returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      opts.provider,
      response.status
    );
  }
  return parsed.data;
}

/**
 * Reachability probe: any HTTP answer counts, only network failure doesn't.
 */
export async function probe(url: string, opts: HttpOptions, init: RequestInit = { method: 'HEAD' }): Promise<boolean> {
  try {
    await fetch(url, { ...init, signal: combineSignals(opts.signal, opts.timeoutMs) });
    return true;
  } catch {
    return false;
  }
}
