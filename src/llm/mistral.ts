/**
 * Mistral adapter. La Plateforme speaks the OpenAI chat-completions
 * format, so this is the shared adapter with Mistral's host and table.
 */

import type { MistralConfig } from '../types/index.js';
import type { ModelProvider } from './provider.js';
import { resolveCatalog } from './catalog.js';
import { createOpenAICompatibleProvider } from './openai-compatible.js';

const DEFAULTS = {
  baseUrl: 'https://api.mistral.ai/v1',
  timeoutMs: 60_000,
};

export function createMistralProvider(config: MistralConfig): ModelProvider {
  return createOpenAICompatibleProvider({
    name: 'mistral',
    baseUrl: config.baseUrl ?? DEFAULTS.baseUrl,
    headers: { Authorization: `Bearer ${config.apiKey}` },
    catalog: resolveCatalog('mistral', config.models),
    timeoutMs: config.timeoutMs ?? DEFAULTS.timeoutMs,
  });
}
