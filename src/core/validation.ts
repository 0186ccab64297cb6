/**
 * Request parsing.
 *
 * Everything that reaches a backend passes through here first. Input
 * is untrusted (HTTP bodies, library callers); output is a frozen
 * GenerationRequest or a ValidationError listing what was wrong.
 */

import { z } from 'zod';
import type { GenerationRequest } from '../types/index.js';
import { ValidationError } from './errors.js';

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

const MetadataSchema = z.record(z.unknown());

/** Parameters a compare call shares across every model */
export const SharedParamsSchema = z.object({
  prompt: z.string().min(1, 'prompt must not be empty').optional(),
  messages: z.array(ChatMessageSchema).min(1, 'messages must not be empty').optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().min(0).max(1).default(1),
  stream: z.boolean().default(false),
  systemPrompt: z.string().optional(),
  stopSequences: z.array(z.string()).optional(),
  metadata: MetadataSchema.default({}),
});

const TargetSchema = z.object({
  model: z.string().trim().min(1, 'model is required'),
  provider: z.string().trim().min(1, 'provider is required'),
});

function requireOneInput(value: { prompt?: string; messages?: unknown[] }, ctx: z.RefinementCtx): void {
  if ((value.prompt !== undefined) === (value.messages !== undefined)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'exactly one of prompt or messages is required',
    });
  }
}

const RequestSchema = TargetSchema.merge(SharedParamsSchema).superRefine(requireOneInput);

export type SharedParams = z.infer<typeof SharedParamsSchema>;

export type ModelTarget = z.infer<typeof TargetSchema>;

export const ConversationInputSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().min(1, 'title is required'),
  model: z.string().min(1, 'model is required'),
  provider: z.string().min(1, 'provider is required'),
  messages: z.array(ChatMessageSchema),
  metadata: MetadataSchema.optional(),
});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Run a zod schema over untrusted input.
 * Failure is a ValidationError carrying one line per issue.
 */
export function validate<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function parseGenerationRequest(input: unknown): GenerationRequest {
  const parsed = validate(RequestSchema, input, 'generation request');

  return Object.freeze({
    ...parsed,
    messages: parsed.messages ? Object.freeze(parsed.messages.map(m => Object.freeze(m))) : undefined,
    stopSequences: parsed.stopSequences ? Object.freeze([...parsed.stopSequences]) : undefined,
    metadata: Object.freeze({ ...parsed.metadata }),
  });
}

export function parseSharedParams(input: unknown): SharedParams {
  return validate(SharedParamsSchema.superRefine(requireOneInput), input, 'compare parameters');
}

export function parseTargets(input: unknown): ModelTarget[] {
  return validate(z.array(TargetSchema), input, 'model list');
}
