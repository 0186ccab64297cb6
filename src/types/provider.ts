/**
 * Backend configuration.
 *
 * One entry per backend family. A family only gets a config entry
 * when its address (local) or credential (cloud) is present, so an
 * entry here always means "this backend can be registered".
 */

import type { ModelDefinition } from './model.js';

export const PROVIDER_TYPES = ['ollama', 'openai', 'anthropic', 'google', 'mistral'] as const;

export type ProviderType = typeof PROVIDER_TYPES[number];

export interface OllamaConfig {
  type: 'ollama';
  /** Ollama API base URL, e.g. http://localhost:11434 */
  baseUrl: string;
  /** Per-request timeout in ms */
  timeoutMs?: number;
}

export interface OpenAIConfig {
  type: 'openai';
  apiKey: string;
  organization?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Extra or overriding catalog entries, keyed by model name */
  models?: Record<string, ModelDefinition>;
}

export interface AnthropicConfig {
  type: 'anthropic';
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Extra or overriding catalog entries, keyed by model name */
  models?: Record<string, ModelDefinition>;
}

export interface GoogleConfig {
  type: 'google';
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Extra or overriding catalog entries, keyed by model name */
  models?: Record<string, ModelDefinition>;
}

export interface MistralConfig {
  type: 'mistral';
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Extra or overriding catalog entries, keyed by model name */
  models?: Record<string, ModelDefinition>;
}

export type ProviderConfig =
  | OllamaConfig
  | OpenAIConfig
  | AnthropicConfig
  | GoogleConfig
  | MistralConfig;

export type CloudProviderConfig = Exclude<ProviderConfig, OllamaConfig>;
