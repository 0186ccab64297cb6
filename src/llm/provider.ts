/**
 * Provider contract.
 *
 * Every backend family (Ollama, OpenAI, Anthropic, Google, Mistral)
 * implements ModelProvider. Callers never see backend wire formats:
 * one GenerationRequest in, one GenerationResponse out.
 *
 * Cost is computed here, once, for every variant.
 */

import type {
  ChatMessage,
  GenerationRequest,
  GenerationResponse,
  ModelInfo,
  ProviderType,
} from '../types/index.js';
import { resolveUsage, type ReportedUsage } from './tokens.js';

export interface ProviderHealth {
  available: boolean;
  detail: Record<string, unknown>;
}

export interface ModelProvider {
  /** Unique, immutable provider name (the backend family) */
  readonly name: ProviderType;
  readonly isLocal: boolean;
  /** This backend's own request timeout in ms (0 = none) */
  readonly timeoutMs: number;

  listModels(signal?: AbortSignal): Promise<ModelInfo[]>;

  /** Throws ModelNotFoundError when the backend has no such model */
  getModelInfo(name: string, signal?: AbortSignal): Promise<ModelInfo>;

  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse>;

  /**
   * Content fragments as they arrive.
   * Breaking out of the loop cancels the backend stream.
   */
  generateStream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<string>;

  /** Cheap reachability probe */
  isAvailable(signal?: AbortSignal): Promise<boolean>;

  /** Reachability plus credential check; never issues a billed call */
  healthCheck(signal?: AbortSignal): Promise<ProviderHealth>;
}

const COST_PRECISION = 1e8;

/**
 * Cost of one call in currency units.
 * Rounded to 8 decimal places, the precision of catalog prices.
 */
export function calculateCost(
  inputTokens: number,
  outputTokens: number,
  info: Pick<ModelInfo, 'isLocal' | 'costPer1kInputTokens' | 'costPer1kOutputTokens'>
): number {
  if (info.isLocal) return 0;

  const cost =
    (inputTokens / 1000) * info.costPer1kInputTokens +
    (outputTokens / 1000) * info.costPer1kOutputTokens;

  return Math.round(cost * COST_PRECISION) / COST_PRECISION;
}

/**
 * Flatten a request into chat messages: system prompt first,
 * then either the message list or the prompt as a single user turn.
 */
export function toChatMessages(request: GenerationRequest): ChatMessage[] {
  const messages: ChatMessage[] = [];

  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }

  if (request.messages) {
    messages.push(...request.messages.map(m => ({ role: m.role, content: m.content })));
  } else if (request.prompt !== undefined) {
    messages.push({ role: 'user', content: request.prompt });
  }

  return messages;
}

export interface ResponseParts {
  request: GenerationRequest;
  info: ModelInfo;
  content: string;
  usage: ReportedUsage;
  latencyMs: number;
  finishReason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Assemble a GenerationResponse from what a backend returned.
 * Fills in missing token counts and derives total and cost.
 */
export function buildResponse(parts: ResponseParts): GenerationResponse {
  const { request, info, content, latencyMs, finishReason } = parts;
  const usage = resolveUsage(parts.usage, toChatMessages(request), content);

  const metadata: Record<string, unknown> = { ...parts.metadata };
  if (usage.estimated) metadata.tokensEstimated = true;

  return {
    model: request.model,
    content,
    provider: info.provider,
    inputTokens: usage.inputTokens,
    outputTokens: usage.outputTokens,
    totalTokens: usage.inputTokens + usage.outputTokens,
    cost: calculateCost(usage.inputTokens, usage.outputTokens, info),
    latencyMs: Math.max(0, latencyMs),
    finishReason,
    metadata,
  };
}
