/**
 * Chat-completions adapter shared by every backend that speaks the
 * OpenAI wire format (OpenAI itself, Mistral).
 *
 * Models and prices come from the catalog; only generation and the
 * health probe go over the network.
 */

import { z } from 'zod';
import type { GenerationRequest, ModelInfo } from '../types/index.js';
import { buildResponse, toChatMessages, type ModelProvider, type ProviderHealth } from './provider.js';
import { catalogModel, catalogModels, type ModelCatalog } from './catalog.js';
import { probe, send, sendJson, type HttpOptions } from './http.js';
import { parseChunk, readEventData } from './stream.js';

export interface OpenAICompatibleOptions {
  name: 'openai' | 'mistral';
  /** API root including the version segment, e.g. https://api.openai.com/v1 */
  baseUrl: string;
  /** Auth and any vendor headers */
  headers: Record<string, string>;
  catalog: ModelCatalog;
  timeoutMs: number;
}

const CompletionSchema = z.object({
  id: z.string().optional(),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
    finish_reason: z.string().nullable().optional(),
  })).default([]),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).nullable().optional(),
});

const ChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({ content: z.string().nullable().optional() }).optional(),
  })).default([]),
});

const ModelsSchema = z.object({
  data: z.array(z.object({ id: z.string() })).default([]),
});

export function createOpenAICompatibleProvider(options: OpenAICompatibleOptions): ModelProvider {
  const { name, catalog, timeoutMs } = options;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const headers = { 'Content-Type': 'application/json', ...options.headers };

  const http = (signal?: AbortSignal, model?: string): HttpOptions => ({
    provider: name,
    signal,
    timeoutMs,
    model,
  });

  function body(request: GenerationRequest, stream: boolean): string {
    return JSON.stringify({
      model: request.model,
      messages: toChatMessages(request),
      temperature: request.temperature,
      top_p: request.topP,
      stream,
      ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      ...(request.stopSequences ? { stop: request.stopSequences } : {}),
    });
  }

  return {
    name,
    isLocal: false,
    timeoutMs,

    async listModels() {
      return catalogModels(name, catalog);
    },

    async getModelInfo(model) {
      return catalogModel(name, catalog, model);
    },

    async generate(request, signal) {
      const info: ModelInfo = catalogModel(name, catalog, request.model);

      const startTime = performance.now();
      const data = await sendJson(
        `${baseUrl}/chat/completions`,
        { method: 'POST', headers, body: body(request, false) },
        CompletionSchema,
        http(signal, request.model)
      );
      const latencyMs = performance.now() - startTime;

      const choice = data.choices[0];
      return buildResponse({
        request,
        info,
        content: choice?.message?.content ?? '',
        usage: {
          inputTokens: data.usage?.prompt_tokens,
          outputTokens: data.usage?.completion_tokens,
        },
        latencyMs,
        finishReason: choice?.finish_reason ?? undefined,
        metadata: {
          id: data.id,
          created: data.created,
          backendModel: data.model,
        },
      });
    },

    async *generateStream(request, signal) {
      catalogModel(name, catalog, request.model);

      const response = await send(
        `${baseUrl}/chat/completions`,
        { method: 'POST', headers, body: body(request, true) },
        http(signal, request.model)
      );

      for await (const data of readEventData(response, http(signal, request.model))) {
        const chunk = ChunkSchema.safeParse(parseChunk(data, name));
        if (!chunk.success) continue;
        const content = chunk.data.choices[0]?.delta?.content;
        if (content) yield content;
      }
    },

    async isAvailable(signal) {
      return probe(baseUrl, http(signal));
    },

    async healthCheck(signal): Promise<ProviderHealth> {
      try {
        const models = await sendJson(
          `${baseUrl}/models`,
          { method: 'GET', headers },
          ModelsSchema,
          http(signal)
        );
        return {
          available: true,
          detail: {
            provider: name,
            modelsCount: Object.keys(catalog).length,
            backendModelsCount: models.data.length,
          },
        };
      } catch (error) {
        return {
          available: false,
          detail: {
            provider: name,
            error: error instanceof Error ? error.message : String(error),
          },
        };
      }
    },
  };
}
