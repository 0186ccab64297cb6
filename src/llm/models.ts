/**
 * Known cloud models with their context windows, capabilities and
 * list prices (USD per 1k tokens).
 */

import type { CloudProviderConfig } from '../types/index.js';
import type { ModelCatalog } from './catalog.js';

export const CLOUD_MODELS: Record<CloudProviderConfig['type'], ModelCatalog> = {
  openai: {
    'gpt-4o': {
      displayName: 'GPT-4o',
      contextLength: 128_000,
      capabilities: ['chat', 'completion', 'vision', 'function_calling'],
      costPer1kInputTokens: 0.0025,
      costPer1kOutputTokens: 0.01,
    },
    'gpt-4o-mini': {
      displayName: 'GPT-4o Mini',
      contextLength: 128_000,
      capabilities: ['chat', 'completion', 'vision', 'function_calling'],
      costPer1kInputTokens: 0.00015,
      costPer1kOutputTokens: 0.0006,
    },
    'gpt-4-turbo': {
      displayName: 'GPT-4 Turbo',
      contextLength: 128_000,
      capabilities: ['chat', 'completion', 'vision', 'function_calling'],
      costPer1kInputTokens: 0.01,
      costPer1kOutputTokens: 0.03,
    },
    'gpt-3.5-turbo': {
      displayName: 'GPT-3.5 Turbo',
      contextLength: 16_385,
      capabilities: ['chat', 'completion', 'function_calling'],
      costPer1kInputTokens: 0.0005,
      costPer1kOutputTokens: 0.0015,
    },
  },
  anthropic: {
    'claude-3-5-sonnet-20241022': {
      displayName: 'Claude 3.5 Sonnet',
      contextLength: 200_000,
      capabilities: ['chat', 'completion', 'vision', 'function_calling'],
      costPer1kInputTokens: 0.003,
      costPer1kOutputTokens: 0.015,
    },
    'claude-3-opus-20240229': {
      displayName: 'Claude 3 Opus',
      contextLength: 200_000,
      capabilities: ['chat', 'completion', 'vision'],
      costPer1kInputTokens: 0.015,
      costPer1kOutputTokens: 0.075,
    },
    'claude-3-haiku-20240307': {
      displayName: 'Claude 3 Haiku',
      contextLength: 200_000,
      capabilities: ['chat', 'completion', 'vision'],
      costPer1kInputTokens: 0.00025,
      costPer1kOutputTokens: 0.00125,
    },
  },
  google: {
    'gemini-1.5-pro': {
      displayName: 'Gemini 1.5 Pro',
      contextLength: 2_000_000,
      capabilities: ['chat', 'completion', 'vision', 'function_calling'],
      costPer1kInputTokens: 0.00125,
      costPer1kOutputTokens: 0.005,
    },
    'gemini-1.5-flash': {
      displayName: 'Gemini 1.5 Flash',
      contextLength: 1_000_000,
      capabilities: ['chat', 'completion', 'vision', 'function_calling'],
      costPer1kInputTokens: 0.000075,
      costPer1kOutputTokens: 0.0003,
    },
    'gemini-pro': {
      displayName: 'Gemini Pro',
      contextLength: 32_760,
      capabilities: ['chat', 'completion'],
      costPer1kInputTokens: 0.0005,
      costPer1kOutputTokens: 0.0015,
    },
  },
  mistral: {
    'mistral-large-latest': {
      displayName: 'Mistral Large',
      contextLength: 128_000,
      capabilities: ['chat', 'completion', 'function_calling'],
      costPer1kInputTokens: 0.002,
      costPer1kOutputTokens: 0.006,
    },
    'mistral-medium-latest': {
      displayName: 'Mistral Medium',
      contextLength: 32_000,
      capabilities: ['chat', 'completion'],
      costPer1kInputTokens: 0.0027,
      costPer1kOutputTokens: 0.0081,
    },
    'mistral-small-latest': {
      displayName: 'Mistral Small',
      contextLength: 32_000,
      capabilities: ['chat', 'completion'],
      costPer1kInputTokens: 0.0002,
      costPer1kOutputTokens: 0.0006,
    },
  },
};
