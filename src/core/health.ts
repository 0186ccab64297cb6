/**
 * Health aggregation across registered backends.
 *
 * Every provider is checked concurrently under one timeout. A check
 * that throws or hangs reports that provider as unavailable; the
 * aggregate itself never rejects.
 */

import type { ProviderHealth } from '../llm/index.js';
import type { ProviderRegistry } from './registry.js';
import { combineSignals } from '../llm/http.js';
import { createLogger } from './logger.js';

const log = createLogger('health');

export type HealthStatus = 'healthy' | 'degraded' | 'unavailable';

export interface HealthReport {
  status: HealthStatus;
  /** One entry per registered provider, in registry order */
  providers: Record<string, ProviderHealth>;
  timestamp: string;
}

export interface HealthAggregatorOptions {
  /** Bound on each provider's check in ms */
  timeoutMs?: number;
}

export interface HealthAggregator {
  check(signal?: AbortSignal): Promise<HealthReport>;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export function overallStatus(results: readonly ProviderHealth[]): HealthStatus {
  const up = results.filter(r => r.available).length;
  if (up > 0 && up === results.length) return 'healthy';
  if (up > 0) return 'degraded';
  return 'unavailable';
}

function unavailable(reason: unknown): ProviderHealth {
  return {
    available: false,
    detail: { error: reason instanceof Error ? reason.message : String(reason) },
  };
}

function withDeadline(check: Promise<ProviderHealth>, signal: AbortSignal | undefined): Promise<ProviderHealth> {
  if (!signal) return check;

  return new Promise(resolve => {
    const onAbort = () => resolve(unavailable('health check timed out'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    void check.then(
      result => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        resolve(unavailable(error));
      }
    );
  });
}

export function createHealthAggregator(
  registry: ProviderRegistry,
  options: HealthAggregatorOptions = {}
): HealthAggregator {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    async check(signal) {
      const providers = registry.list();

      const results = await Promise.all(providers.map(provider => {
        const deadline = combineSignals(signal, timeoutMs);
        let check: Promise<ProviderHealth>;
        try {
          check = provider.healthCheck(deadline);
        } catch (error) {
          check = Promise.resolve(unavailable(error));
        }
        return withDeadline(check, deadline);
      }));

      const report: Record<string, ProviderHealth> = {};
      providers.forEach((provider, i) => {
        const result = results[i] ?? unavailable('no result');
        report[provider.name] = result;
        if (!result.available) log.warn(`${provider.name} unavailable`, result.detail);
      });

      return {
        status: overallStatus(results),
        providers: report,
        timestamp: new Date().toISOString(),
      };
    },
  };
}
