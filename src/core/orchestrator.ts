/**
 * The orchestrator sits between callers and backends.
 *
 * Flow of a single call:
 *   1. Parse the request (ValidationError, never dispatched)
 *   2. Resolve the provider (ProviderNotConfiguredError, never dispatched)
 *   3. Dispatch under a per-attempt timeout, retrying transient failures
 *   4. Append a usage record (a ledger failure is only logged)
 *   5. Return the response
 *
 * Compare runs that path once per (model, provider) pair, concurrently,
 * and hands back one slot per pair in input order.
 */

import type {
  GenerationRequest,
  GenerationResponse,
  ModelCapability,
  ModelInfo,
  UsageLedger,
} from '../types/index.js';
import { MODEL_CAPABILITIES } from '../types/index.js';
import type { ModelProvider } from '../llm/index.js';
import { combineSignals } from '../llm/http.js';
import type { ProviderRegistry } from './registry.js';
import { withRetry, type RetryPolicy } from './retry.js';
import { parseGenerationRequest, parseSharedParams, parseTargets } from './validation.js';
import {
  CancelledError,
  ModelNotFoundError,
  StorageError,
  TransientError,
  ValidationError,
  isModelGateError,
  toErrorDescriptor,
  type ErrorDescriptor,
} from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('orchestrator');

/** Failures that reached a backend and belong in the ledger */
function reachedBackend(error: unknown): boolean {
  if (!isModelGateError(error)) return false;
  switch (error.kind) {
    case 'transient':
    case 'auth':
    case 'backend':
      return true;
    case 'model_not_found':
      // Catalog misses are rejected before any request goes out
      return error instanceof ModelNotFoundError && error.status !== undefined;
    default:
      return false;
  }
}

/** Attempt bound: the longer of the call timeout and the provider's own */
export function attemptTimeout(timeoutMs: number, provider: Pick<ModelProvider, 'timeoutMs'>): number {
  if (timeoutMs <= 0) return 0;
  return Math.max(timeoutMs, provider.timeoutMs);
}

export interface OrchestratorConfig {
  registry: ProviderRegistry;
  /** Usage sink; omit to run without accounting */
  ledger?: UsageLedger;
  retry: RetryPolicy;
  /**
   * Bound on one backend attempt in ms (0 = none). A provider whose own
   * timeout is longer gets its own.
   */
  timeoutMs: number;
  /** Write usage records; defaults to true when a ledger is given */
  trackUsage?: boolean;
}

export type CompareResult =
  | { ok: true; model: string; provider: string; response: GenerationResponse }
  | { ok: false; model: string; provider: string; error: ErrorDescriptor };

export interface ListModelsOptions {
  provider?: string;
  capability?: string;
}

export interface Orchestrator {
  generate(input: unknown, signal?: AbortSignal): Promise<GenerationResponse>;
  compare(targets: unknown, shared: unknown, signal?: AbortSignal): Promise<CompareResult[]>;
  /** Chunks straight from the backend; not retried, not recorded */
  stream(input: unknown, signal?: AbortSignal): AsyncIterable<string>;
  listModels(options?: ListModelsOptions, signal?: AbortSignal): Promise<ModelInfo[]>;
  getModelInfo(model: string, provider: string, signal?: AbortSignal): Promise<ModelInfo>;
}

function parseCapability(value: string | undefined): ModelCapability | undefined {
  if (value === undefined) return undefined;
  const match = MODEL_CAPABILITIES.find(c => c === value);
  if (!match) {
    throw new ValidationError(`Unknown capability "${value}"`, [
      `capability must be one of ${MODEL_CAPABILITIES.join(', ')}`,
    ]);
  }
  return match;
}

/**
 * Run one backend attempt, settling as soon as the attempt signal fires
 * even if the provider ignores it.
 */
function runAttempt<T>(
  work: (signal: AbortSignal | undefined) => Promise<T>,
  provider: string,
  timeoutMs: number,
  callerSignal?: AbortSignal
): Promise<T> {
  const signal = combineSignals(callerSignal, timeoutMs);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(callerSignal?.aborted
        ? new CancelledError(`${provider} request cancelled`, provider)
        : new TransientError(`${provider} request timed out after ${timeoutMs}ms`, provider));
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    void work(signal).then(
      value => {
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function createOrchestrator(config: OrchestratorConfig): Orchestrator {
  const { registry, ledger, retry, timeoutMs } = config;
  const tracking = Boolean(ledger) && (config.trackUsage ?? true);

  function record(write: (sink: UsageLedger) => void): void {
    if (!ledger || !tracking) return;
    try {
      write(ledger);
    } catch (error) {
      const failure = error instanceof StorageError
        ? error
        : new StorageError('Usage record could not be written', { cause: error });
      log.error(`${failure.message}; response still delivered`, error);
    }
  }

  async function dispatch(
    provider: ModelProvider,
    request: GenerationRequest,
    signal?: AbortSignal
  ): Promise<GenerationResponse> {
    const label = `${request.provider}/${request.model}`;
    const bound = attemptTimeout(timeoutMs, provider);
    const startTime = performance.now();
    let attempts = 0;

    try {
      const response = await withRetry(
        attempt => {
          attempts = attempt;
          log.debug(`${label} dispatched (attempt ${attempt}/${retry.maxAttempts})`);
          return runAttempt(s => provider.generate(request, s), request.provider, bound, signal);
        },
        retry,
        {
          signal,
          onRetry: ({ attempt, delayMs, error }) => {
            log.debug(`${label} retrying in ${delayMs}ms after attempt ${attempt}: ${toErrorDescriptor(error).message}`);
          },
        }
      );

      log.debug(`${label} succeeded in ${Math.round(response.latencyMs)}ms`);
      record(sink => sink.append({
        model: response.model,
        provider: response.provider,
        inputTokens: response.inputTokens,
        outputTokens: response.outputTokens,
        totalTokens: response.totalTokens,
        cost: response.cost,
        latencyMs: response.latencyMs,
        status: 'success',
        error: null,
        metadata: { ...request.metadata, attempts },
      }));
      return response;
    } catch (error) {
      const failure = signal?.aborted && !(error instanceof CancelledError)
        ? new CancelledError(`${request.provider} request cancelled`, request.provider)
        : error;
      const descriptor = toErrorDescriptor(failure);
      log.debug(`${label} failed after ${attempts} attempt(s): ${descriptor.kind}`);

      if (reachedBackend(failure)) {
        record(sink => sink.append({
          model: request.model,
          provider: request.provider,
          inputTokens: 0,
          outputTokens: 0,
          totalTokens: 0,
          cost: 0,
          latencyMs: Math.max(0, performance.now() - startTime),
          status: 'error',
          error: descriptor.message,
          metadata: { ...request.metadata, attempts, kind: descriptor.kind },
        }));
      }
      throw failure;
    }
  }

  async function generate(input: unknown, signal?: AbortSignal): Promise<GenerationResponse> {
    const request = parseGenerationRequest(input);
    log.debug(`${request.provider}/${request.model} validated`);

    const provider = registry.get(request.provider);
    return dispatch(provider, request, signal);
  }

  return {
    generate,

    async compare(targets, shared, signal) {
      const params = parseSharedParams(shared);
      const pairs = parseTargets(targets);
      if (signal?.aborted) throw new CancelledError('Compare cancelled');

      log.debug(`compare across ${pairs.length} model(s)`);

      const results = await Promise.all(pairs.map(async ({ model, provider }): Promise<CompareResult> => {
        try {
          const response = await generate({ ...params, model, provider }, signal);
          return { ok: true, model, provider, response };
        } catch (error) {
          return { ok: false, model, provider, error: toErrorDescriptor(error) };
        }
      }));

      if (signal?.aborted) throw new CancelledError('Compare cancelled');
      return results;
    },

    stream(input, signal) {
      const request = parseGenerationRequest(input);
      const provider = registry.get(request.provider);
      log.debug(`${request.provider}/${request.model} streaming`);
      return provider.generateStream(request, signal);
    },

    async listModels(options = {}, signal) {
      const capability = parseCapability(options.capability);

      let models: ModelInfo[];
      if (options.provider) {
        models = await registry.get(options.provider).listModels(signal);
      } else {
        const providers = registry.list();
        const listings = await Promise.allSettled(providers.map(p => p.listModels(signal)));
        models = [];
        listings.forEach((listing, i) => {
          if (listing.status === 'fulfilled') {
            models.push(...listing.value);
          } else {
            const name = providers[i]?.name ?? 'unknown';
            const reason = isModelGateError(listing.reason) ? listing.reason.message : String(listing.reason);
            log.warn(`Skipping ${name} in model listing: ${reason}`);
          }
        });
      }

      return capability === undefined
        ? models
        : models.filter(m => m.capabilities.includes(capability));
    },

    async getModelInfo(model, provider, signal) {
      if (!model || !provider) {
        throw new ValidationError('model and provider are required');
      }
      return registry.get(provider).getModelInfo(model, signal);
    },
  };
}
