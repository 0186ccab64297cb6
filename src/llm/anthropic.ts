/**
 * Anthropic adapter (Messages API).
 *
 * Anthropic takes the system prompt as a top-level field, not as a
 * message, so system turns are folded into `system` before sending.
 */

import { z } from 'zod';
import type { AnthropicConfig, GenerationRequest } from '../types/index.js';
import { BackendError } from '../core/errors.js';
import { buildResponse, toChatMessages, type ModelProvider, type ProviderHealth } from './provider.js';
import { catalogModel, catalogModels, resolveCatalog } from './catalog.js';
import { probe, send, sendJson, type HttpOptions } from './http.js';
import { parseChunk, readEventData } from './stream.js';

const DEFAULTS = {
  baseUrl: 'https://api.anthropic.com',
  apiVersion: '2023-06-01',
  // Anthropic requires max_tokens on every request
  maxTokens: 4096,
  timeoutMs: 120_000,
};

const MessageSchema = z.object({
  id: z.string().optional(),
  type: z.string().optional(),
  model: z.string().optional(),
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  })).default([]),
  stop_reason: z.string().nullable().optional(),
  usage: z.object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
  }).optional(),
});

const EventSchema = z.object({
  type: z.string(),
  delta: z.object({
    type: z.string().optional(),
    text: z.string().optional(),
  }).optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

const ModelsSchema = z.object({
  data: z.array(z.object({ id: z.string() })).default([]),
});

export function createAnthropicProvider(config: AnthropicConfig): ModelProvider {
  const baseUrl = (config.baseUrl ?? DEFAULTS.baseUrl).replace(/\/+$/, '');
  const timeoutMs = config.timeoutMs ?? DEFAULTS.timeoutMs;
  const catalog = resolveCatalog('anthropic', config.models);

  const headers = {
    'Content-Type': 'application/json',
    'x-api-key': config.apiKey,
    'anthropic-version': DEFAULTS.apiVersion,
  };

  const http = (signal?: AbortSignal, model?: string): HttpOptions => ({
    provider: 'anthropic',
    signal,
    timeoutMs,
    model,
  });

  function body(request: GenerationRequest, stream: boolean): string {
    const chat = toChatMessages(request);
    const system = chat
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    return JSON.stringify({
      model: request.model,
      max_tokens: request.maxTokens ?? DEFAULTS.maxTokens,
      messages: chat.filter(m => m.role !== 'system'),
      temperature: request.temperature,
      top_p: request.topP,
      stream,
      ...(system ? { system } : {}),
      ...(request.stopSequences ? { stop_sequences: request.stopSequences } : {}),
    });
  }

  return {
    name: 'anthropic',
    isLocal: false,
    timeoutMs,

    async listModels() {
      return catalogModels('anthropic', catalog);
    },

    async getModelInfo(model) {
      return catalogModel('anthropic', catalog, model);
    },

    async generate(request, signal) {
      const info = catalogModel('anthropic', catalog, request.model);

      const startTime = performance.now();
      const data = await sendJson(
        `${baseUrl}/v1/messages`,
        { method: 'POST', headers, body: body(request, false) },
        MessageSchema,
        http(signal, request.model)
      );
      const latencyMs = performance.now() - startTime;

      const content = data.content
        .filter(block => block.type === 'text')
        .map(block => block.text ?? '')
        .join('');

      return buildResponse({
        request,
        info,
        content,
        usage: {
          inputTokens: data.usage?.input_tokens,
          outputTokens: data.usage?.output_tokens,
        },
        latencyMs,
        finishReason: data.stop_reason ?? undefined,
        metadata: {
          id: data.id,
          type: data.type,
          backendModel: data.model,
        },
      });
    },

    async *generateStream(request, signal) {
      catalogModel('anthropic', catalog, request.model);

      const response = await send(
        `${baseUrl}/v1/messages`,
        { method: 'POST', headers, body: body(request, true) },
        http(signal, request.model)
      );

      for await (const data of readEventData(response, http(signal, request.model))) {
        const event = EventSchema.safeParse(parseChunk(data, 'anthropic'));
        if (!event.success) continue;

        switch (event.data.type) {
          case 'content_block_delta':
            if (event.data.delta?.type === 'text_delta' && event.data.delta.text) {
              yield event.data.delta.text;
            }
            break;
          case 'error':
            throw new BackendError(
              `anthropic stream failed: ${event.data.error?.message ?? 'unknown error'}`,
              'anthropic'
            );
          case 'message_stop':
            return;
        }
      }
    },

    async isAvailable(signal) {
      return probe(baseUrl, http(signal));
    },

    async healthCheck(signal): Promise<ProviderHealth> {
      try {
        const models = await sendJson(
          `${baseUrl}/v1/models`,
          { method: 'GET', headers },
          ModelsSchema,
          http(signal)
        );
        return {
          available: true,
          detail: {
            provider: 'anthropic',
            modelsCount: Object.keys(catalog).length,
            backendModelsCount: models.data.length,
          },
        };
      } catch (error) {
        return {
          available: false,
          detail: {
            provider: 'anthropic',
            error: error instanceof Error ? error.message : String(error),
          },
        };
      }
    },
  };
}
