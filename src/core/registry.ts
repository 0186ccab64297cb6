/**
 * Provider registry.
 *
 * Built once at startup from the configured backends and never
 * mutated afterwards. Lookups of a family that was not configured
 * fail with ProviderNotConfiguredError instead of returning undefined.
 */

import type { ProviderConfig } from '../types/index.js';
import { createProvider, type ModelProvider } from '../llm/index.js';
import { ProviderNotConfiguredError } from './errors.js';

export interface ProviderRegistry {
  /** Throws ProviderNotConfiguredError for an unknown name */
  get(name: string): ModelProvider;
  has(name: string): boolean;
  /** Registered names in configuration order */
  names(): string[];
  list(): ModelProvider[];
  readonly size: number;
}

export function createRegistry(providers: readonly ModelProvider[]): ProviderRegistry {
  const map = new Map<string, ModelProvider>();
  for (const provider of providers) {
    if (map.has(provider.name)) {
      throw new Error(`Duplicate provider "${provider.name}"`);
    }
    map.set(provider.name, provider);
  }

  return Object.freeze({
    get(name: string) {
      const provider = map.get(name);
      if (!provider) throw new ProviderNotConfiguredError(name);
      return provider;
    },
    has: (name: string) => map.has(name),
    names: () => [...map.keys()],
    list: () => [...map.values()],
    size: map.size,
  });
}

export function createRegistryFromConfig(configs: readonly ProviderConfig[]): ProviderRegistry {
  return createRegistry(configs.map(config => createProvider(config)));
}
