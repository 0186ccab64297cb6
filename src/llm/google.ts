/**
 * Google Gemini adapter (Generative Language API, v1beta).
 *
 * Gemini calls the assistant role "model" and takes the system
 * prompt as `systemInstruction`.
 */

import { z } from 'zod';
import type { GenerationRequest, GoogleConfig } from '../types/index.js';
import { buildResponse, toChatMessages, type ModelProvider, type ProviderHealth } from './provider.js';
import { catalogModel, catalogModels, resolveCatalog } from './catalog.js';
import { probe, send, sendJson, type HttpOptions } from './http.js';
import { parseChunk, readEventData } from './stream.js';

const DEFAULTS = {
  baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
  timeoutMs: 60_000,
};

const CandidateSchema = z.object({
  content: z.object({
    parts: z.array(z.object({ text: z.string().optional() })).default([]),
  }).optional(),
  finishReason: z.string().optional(),
});

const GenerateSchema = z.object({
  candidates: z.array(CandidateSchema).default([]),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
  }).optional(),
  modelVersion: z.string().optional(),
});

const ModelsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

type Candidate = z.infer<typeof CandidateSchema>;

function candidateText(candidate: Candidate | undefined): string {
  return candidate?.content?.parts.map(p => p.text ?? '').join('') ?? '';
}

export function createGoogleProvider(config: GoogleConfig): ModelProvider {
  const baseUrl = (config.baseUrl ?? DEFAULTS.baseUrl).replace(/\/+$/, '');
  const timeoutMs = config.timeoutMs ?? DEFAULTS.timeoutMs;
  const catalog = resolveCatalog('google', config.models);

  const headers = {
    'Content-Type': 'application/json',
    'x-goog-api-key': config.apiKey,
  };

  const http = (signal?: AbortSignal, model?: string): HttpOptions => ({
    provider: 'google',
    signal,
    timeoutMs,
    model,
  });

  function body(request: GenerationRequest): string {
    const chat = toChatMessages(request);
    const system = chat
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    return JSON.stringify({
      contents: chat
        .filter(m => m.role !== 'system')
        .map(m => ({
          role: m.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: m.content }],
        })),
      ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
      generationConfig: {
        temperature: request.temperature,
        topP: request.topP,
        ...(request.maxTokens !== undefined ? { maxOutputTokens: request.maxTokens } : {}),
        ...(request.stopSequences ? { stopSequences: request.stopSequences } : {}),
      },
    });
  }

  const modelPath = (model: string) => `${baseUrl}/models/${encodeURIComponent(model)}`;

  return {
    name: 'google',
    isLocal: false,
    timeoutMs,

    async listModels() {
      return catalogModels('google', catalog);
    },

    async getModelInfo(model) {
      return catalogModel('google', catalog, model);
    },

    async generate(request, signal) {
      const info = catalogModel('google', catalog, request.model);

      const startTime = performance.now();
      const data = await sendJson(
        `${modelPath(request.model)}:generateContent`,
        { method: 'POST', headers, body: body(request) },
        GenerateSchema,
        http(signal, request.model)
      );
      const latencyMs = performance.now() - startTime;

      const candidate = data.candidates[0];
      return buildResponse({
        request,
        info,
        content: candidateText(candidate),
        usage: {
          inputTokens: data.usageMetadata?.promptTokenCount,
          outputTokens: data.usageMetadata?.candidatesTokenCount,
        },
        latencyMs,
        finishReason: candidate?.finishReason,
        metadata: { modelVersion: data.modelVersion },
      });
    },

    async *generateStream(request, signal) {
      catalogModel('google', catalog, request.model);

      const response = await send(
        `${modelPath(request.model)}:streamGenerateContent?alt=sse`,
        { method: 'POST', headers, body: body(request) },
        http(signal, request.model)
      );

      for await (const data of readEventData(response, http(signal, request.model))) {
        const chunk = GenerateSchema.safeParse(parseChunk(data, 'google'));
        if (!chunk.success) continue;
        const text = candidateText(chunk.data.candidates[0]);
        if (text) yield text;
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
            provider: 'google',
            modelsCount: Object.keys(catalog).length,
            backendModelsCount: models.models.length,
          },
        };
      } catch (error) {
        return {
          available: false,
          detail: {
            provider: 'google',
            error: error instanceof Error ? error.message : String(error),
          },
        };
      }
    },
  };
}
