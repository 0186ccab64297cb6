/**
 * Provider factory.
 *
 * Creates the right adapter based on config.
 * Add new backend families here.
 */

import type { ProviderConfig } from '../types/index.js';
import type { ModelProvider } from './provider.js';
import { createOllamaProvider } from './ollama.js';
import { createOpenAIProvider } from './openai.js';
import { createAnthropicProvider } from './anthropic.js';
import { createGoogleProvider } from './google.js';
import { createMistralProvider } from './mistral.js';

export type { ModelProvider, ProviderHealth } from './provider.js';
export type { OllamaProvider } from './ollama.js';
export { isOllamaProvider } from './ollama.js';
export { calculateCost } from './provider.js';

export function createProvider(config: ProviderConfig): ModelProvider {
  switch (config.type) {
    case 'ollama':
      return createOllamaProvider(config);

    case 'openai':
      return createOpenAIProvider(config);

    case 'anthropic':
      return createAnthropicProvider(config);

    case 'google':
      return createGoogleProvider(config);

    case 'mistral':
      return createMistralProvider(config);

    default: {
      const unknown: never = config;
      throw new Error(`Unknown provider type: ${JSON.stringify(unknown)}`);
    }
  }
}
