/**
 * Token counts.
 *
 * Backends usually report exact counts. When one doesn't, the count is
 * estimated at 4 characters per token, the same rule for every
 * provider, so cost stays deterministic for a given text.
 */

import type { ChatMessage } from '../types/index.js';

export const CHARS_PER_TOKEN = 4;

export interface ReportedUsage {
  inputTokens?: number | null;
  outputTokens?: number | null;
}

export interface ResolvedUsage {
  inputTokens: number;
  outputTokens: number;
  /** True when at least one side was estimated */
  estimated: boolean;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function estimateMessageTokens(messages: readonly ChatMessage[]): number {
  const chars = messages.reduce((sum, m) => sum + m.content.length, 0);
  return Math.ceil(chars / CHARS_PER_TOKEN);
}

function isCount(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

export function resolveUsage(
  reported: ReportedUsage,
  prompt: readonly ChatMessage[],
  output: string
): ResolvedUsage {
  const input = isCount(reported.inputTokens) ? reported.inputTokens : null;
  const out = isCount(reported.outputTokens) ? reported.outputTokens : null;

  return {
    inputTokens: input ?? estimateMessageTokens(prompt),
    outputTokens: out ?? estimateTokens(output),
    estimated: input === null || out === null,
  };
}
