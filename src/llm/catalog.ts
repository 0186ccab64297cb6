/**
 * Cloud model catalogs.
 *
 * Cloud model listings don't carry prices, so each cloud adapter
 * answers listModels / getModelInfo from a static table (models.ts).
 * Callers may extend or override a table through configuration.
 */

import type { ModelDefinition, ModelInfo } from '../types/index.js';
import { ModelNotFoundError } from '../core/errors.js';
import { CLOUD_MODELS } from './models.js';

export type { ModelDefinition };

export type ModelCatalog = Record<string, ModelDefinition>;

function toModelInfo(provider: string, name: string, def: ModelDefinition): ModelInfo {
  return Object.freeze({
    name,
    displayName: def.displayName,
    provider,
    contextLength: def.contextLength,
    capabilities: Object.freeze([...def.capabilities]),
    costPer1kInputTokens: def.costPer1kInputTokens,
    costPer1kOutputTokens: def.costPer1kOutputTokens,
    isLocal: false,
    metadata: Object.freeze({}),
  });
}

export function catalogModels(provider: string, catalog: ModelCatalog): ModelInfo[] {
  return Object.entries(catalog).map(([name, def]) => toModelInfo(provider, name, def));
}

export function catalogModel(provider: string, catalog: ModelCatalog, name: string): ModelInfo {
  const def = Object.hasOwn(catalog, name) ? catalog[name] : undefined;
  if (!def) throw new ModelNotFoundError(name, provider);
  return toModelInfo(provider, name, def);
}

/** Built-in table for a cloud family, with configured entries layered on top */
export function resolveCatalog(
  provider: keyof typeof CLOUD_MODELS,
  overrides: ModelCatalog = {}
): ModelCatalog {
  return { ...CLOUD_MODELS[provider], ...overrides };
}
