/**
 * Core value types shared by providers, the orchestrator and the store.
 *
 * A request goes in and a response comes out in the same shape,
 * whichever backend actually ran the model.
 */

export const MODEL_CAPABILITIES = [
  'chat',
  'completion',
  'vision',
  'function_calling',
  'code',
] as const;

export type ModelCapability = typeof MODEL_CAPABILITIES[number];

export interface ModelInfo {
  /** Backend model identifier, e.g. `gpt-4o` or `llama3:8b` */
  readonly name: string;
  readonly displayName: string;
  /** Name of the provider that owns this model */
  readonly provider: string;
  /** Context window in tokens */
  readonly contextLength: number;
  readonly capabilities: readonly ModelCapability[];
  readonly costPer1kInputTokens: number;
  readonly costPer1kOutputTokens: number;
  /** Local models are never billed */
  readonly isLocal: boolean;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** A catalog entry: what a cloud adapter knows about a model it serves */
export interface ModelDefinition {
  displayName: string;
  contextLength: number;
  capabilities: ModelCapability[];
  /** USD per 1k input tokens */
  costPer1kInputTokens: number;
  /** USD per 1k output tokens */
  costPer1kOutputTokens: number;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * A validated generation request.
 * Only the request parser builds these; they are frozen afterwards.
 */
export interface GenerationRequest {
  readonly model: string;
  readonly provider: string;
  /** Exactly one of prompt / messages is set */
  readonly prompt?: string;
  readonly messages?: readonly ChatMessage[];
  readonly maxTokens?: number;
  /** 0–2, default 0.7 */
  readonly temperature: number;
  /** 0–1, default 1 */
  readonly topP: number;
  readonly stream: boolean;
  readonly systemPrompt?: string;
  readonly stopSequences?: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface GenerationResponse {
  model: string;
  content: string;
  provider: string;
  inputTokens: number;
  outputTokens: number;
  /** Always inputTokens + outputTokens */
  totalTokens: number;
  cost: number;
  /** Wall-clock time of the backend call only */
  latencyMs: number;
  finishReason?: string;
  metadata: Record<string, unknown>;
}
