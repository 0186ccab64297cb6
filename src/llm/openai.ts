/**
 * OpenAI adapter.
 */

import type { OpenAIConfig } from '../types/index.js';
import type { ModelProvider } from './provider.js';
import { resolveCatalog } from './catalog.js';
import { createOpenAICompatibleProvider } from './openai-compatible.js';

const DEFAULTS = {
  baseUrl: 'https://api.openai.com/v1',
  timeoutMs: 60_000,
};

export function createOpenAIProvider(config: OpenAIConfig): ModelProvider {
  return createOpenAICompatibleProvider({
    name: 'openai',
    baseUrl: config.baseUrl ?? DEFAULTS.baseUrl,
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      ...(config.organization ? { 'OpenAI-Organization': config.organization } : {}),
    },
    catalog: resolveCatalog('openai', config.models),
    timeoutMs: config.timeoutMs ?? DEFAULTS.timeoutMs,
  });
}
