/**
 * Ollama adapter. Talks to a local Ollama instance.
 *
 * No API keys, no per-token billing: every call costs 0.
 * Models are whatever the local server has pulled.
 */

import { z } from 'zod';
import type { GenerationRequest, ModelCapability, ModelInfo, OllamaConfig } from '../types/index.js';
import { BackendError, ModelNotFoundError } from '../core/errors.js';
import { buildResponse, toChatMessages, type ModelProvider, type ProviderHealth } from './provider.js';
import { send, sendJson, type HttpOptions } from './http.js';
import { parseChunk, readLines } from './stream.js';

const DEFAULTS = {
  timeoutMs: 120_000,
  contextLength: 4096,
};

const TagsSchema = z.object({
  models: z.array(z.object({
    name: z.string(),
    modified_at: z.string().optional(),
    size: z.number().optional(),
    digest: z.string().optional(),
    details: z.object({
      family: z.string().optional(),
      parameter_size: z.string().optional(),
      quantization_level: z.string().optional(),
    }).partial().optional(),
  })).default([]),
});

const ChatSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string().default('') }).optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  total_duration: z.number().optional(),
  load_duration: z.number().optional(),
  prompt_eval_duration: z.number().optional(),
  eval_duration: z.number().optional(),
});

const ChunkSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

const VersionSchema = z.object({ version: z.string().optional() });

const PullSchema = z.object({ status: z.string().optional() });

type OllamaTag = z.infer<typeof TagsSchema>['models'][number];

export interface OllamaProvider extends ModelProvider {
  readonly name: 'ollama';
  readonly baseUrl: string;
  /** Download a model into the local server */
  pullModel(name: string, signal?: AbortSignal): Promise<{ status: string }>;
  /** Remove a model from local storage */
  deleteModel(name: string, signal?: AbortSignal): Promise<void>;
}

/** Capabilities guessed from the model name; Ollama doesn't report them. */
export function inferCapabilities(modelName: string): ModelCapability[] {
  const lower = modelName.toLowerCase();
  const capabilities: ModelCapability[] = ['chat', 'completion'];
  if (lower.includes('code')) capabilities.push('code');
  if (lower.includes('vision') || lower.includes('llava')) capabilities.push('vision');
  return capabilities;
}

function toModelInfo(tag: OllamaTag): ModelInfo {
  const base = tag.name.split(':')[0] ?? tag.name;
  return Object.freeze({
    name: tag.name,
    displayName: base.charAt(0).toUpperCase() + base.slice(1),
    provider: 'ollama',
    contextLength: DEFAULTS.contextLength,
    capabilities: inferCapabilities(base),
    costPer1kInputTokens: 0,
    costPer1kOutputTokens: 0,
    isLocal: true,
    metadata: Object.freeze({
      size: tag.size ?? 0,
      modifiedAt: tag.modified_at ?? '',
      digest: tag.digest ?? '',
      family: tag.details?.family,
      parameterSize: tag.details?.parameter_size,
      quantization: tag.details?.quantization_level,
    }),
  });
}

/** Generation never needs a listing round-trip: local calls are free. */
function localInfo(model: string): ModelInfo {
  return toModelInfo({ name: model });
}

export function createOllamaProvider(config: OllamaConfig): OllamaProvider {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const timeoutMs = config.timeoutMs ?? DEFAULTS.timeoutMs;

  const http = (signal?: AbortSignal, model?: string): HttpOptions => ({
    provider: 'ollama',
    signal,
    timeoutMs,
    model,
  });

  function chatBody(request: GenerationRequest, stream: boolean) {
    return JSON.stringify({
      model: request.model,
      messages: toChatMessages(request),
      stream,
      options: {
        temperature: request.temperature,
        top_p: request.topP,
        ...(request.maxTokens !== undefined ? { num_predict: request.maxTokens } : {}),
        ...(request.stopSequences ? { stop: request.stopSequences } : {}),
      },
    });
  }

  async function listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    const data = await sendJson(`${baseUrl}/api/tags`, { method: 'GET' }, TagsSchema, http(signal));
    return data.models.map(toModelInfo);
  }

  return {
    name: 'ollama',
    isLocal: true,
    timeoutMs,
    baseUrl,

    listModels,

    async getModelInfo(name, signal) {
      const models = await listModels(signal);
      const match = models.find(m => m.name === name)
        ?? models.find(m => m.name.startsWith(`${name}:`));
      if (!match) throw new ModelNotFoundError(name, 'ollama');
      return match;
    },

    async generate(request, signal) {
      const startTime = performance.now();
      const data = await sendJson(
        `${baseUrl}/api/chat`,
        { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: chatBody(request, false) },
        ChatSchema,
        http(signal, request.model)
      );
      const latencyMs = performance.now() - startTime;

      return buildResponse({
        request,
        info: localInfo(request.model),
        content: data.message?.content ?? '',
        usage: { inputTokens: data.prompt_eval_count, outputTokens: data.eval_count },
        latencyMs,
        finishReason: data.done_reason,
        metadata: {
          totalDuration: data.total_duration ?? 0,
          loadDuration: data.load_duration ?? 0,
          promptEvalDuration: data.prompt_eval_duration ?? 0,
          evalDuration: data.eval_duration ?? 0,
        },
      });
    },

    async *generateStream(request, signal) {
      const response = await send(
        `${baseUrl}/api/chat`,
        { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: chatBody(request, true) },
        http(signal, request.model)
      );

      for await (const line of readLines(response, http(signal, request.model))) {
        const chunk = ChunkSchema.safeParse(parseChunk(line, 'ollama'));
        if (!chunk.success) continue;
        if (chunk.data.error) {
          throw new BackendError(`ollama stream failed: ${chunk.data.error}`, 'ollama');
        }
        const content = chunk.data.message?.content;
        if (content) yield content;
        if (chunk.data.done) return;
      }
    },

    async isAvailable(signal) {
      try {
        await sendJson(`${baseUrl}/api/version`, { method: 'GET' }, VersionSchema, http(signal));
        return true;
      } catch {
        return false;
      }
    },

    async healthCheck(signal): Promise<ProviderHealth> {
      try {
        const models = await listModels(signal);
        return {
          available: true,
          detail: {
            host: baseUrl,
            modelsCount: models.length,
            models: models.map(m => m.name),
          },
        };
      } catch (error) {
        return {
          available: false,
          detail: {
            host: baseUrl,
            error: error instanceof Error ? error.message : String(error),
          },
        };
      }
    },

    async pullModel(name, signal) {
      const data = await sendJson(
        `${baseUrl}/api/pull`,
        { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify({ model: name, stream: false }) },
        PullSchema,
        // Pulls are large downloads; no timeout, only the caller's cancel.
        { provider: 'ollama', signal, model: name }
      );
      return { status: data.status ?? 'success' };
    },

    async deleteModel(name, signal) {
      await send(
        `${baseUrl}/api/delete`,
        { method: 'DELETE', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify({ model: name }) },
        http(signal, name)
      );
    },
  };
}

export function isOllamaProvider(provider: ModelProvider): provider is OllamaProvider {
  return provider.name === 'ollama' && 'pullModel' in provider && 'deleteModel' in provider;
}
