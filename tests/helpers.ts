/**
 * Shared test fixtures: canned HTTP responses and an in-process
 * stand-in for a backend.
 */

import { vi, type Mock } from 'vitest';
import type { GenerationRequest, ModelInfo, ProviderType } from '../src/types/index.js';
import type { ModelProvider } from '../src/llm/index.js';
import { buildResponse } from '../src/llm/provider.js';
import { parseGenerationRequest } from '../src/core/validation.js';

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status });
}

/** Server-sent events, one `data:` line per payload */
export function sseResponse(payloads: Array<unknown>, trailer = ''): Response {
  const body = payloads
    .map(p => `data: ${typeof p === 'string' ? p : JSON.stringify(p)}\n\n`)
    .join('') + trailer;
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

export function ndjsonResponse(lines: unknown[]): Response {
  return new Response(lines.map(l => JSON.stringify(l)).join('\n') + '\n', { status: 200 });
}

/** Replace global fetch; each call gets a fresh Response from `respond` */
export function stubFetch(respond: (url: string, init: RequestInit) => Response | Promise<Response>): Mock {
  const mock = vi.fn(async (input: string | URL | Request, init: RequestInit = {}) =>
    respond(String(input), init)
  );
  vi.stubGlobal('fetch', mock);
  return mock;
}

export function fetchCall(mock: Mock, index = 0): { url: string; init: RequestInit; body: unknown } {
  const call = mock.mock.calls[index];
  if (!call) throw new Error(`fetch was not called ${index + 1} time(s)`);
  const url = String(call[0]);
  const init: RequestInit = call[1] ?? {};
  const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
  return { url, init, body };
}

export function header(init: RequestInit, name: string): string | undefined {
  const headers = new Headers(init.headers);
  return headers.get(name) ?? undefined;
}

export function request(fields: Record<string, unknown>): GenerationRequest {
  return parseGenerationRequest(fields);
}

export function modelInfo(provider: ProviderType, name: string, overrides: Partial<ModelInfo> = {}): ModelInfo {
  return {
    name,
    displayName: name,
    provider,
    contextLength: 4096,
    capabilities: ['chat', 'completion'],
    costPer1kInputTokens: 0,
    costPer1kOutputTokens: 0,
    isLocal: provider === 'ollama',
    metadata: {},
    ...overrides,
  };
}

/**
 * A backend that answers every generate with `<provider>:<model>`,
 * 10 input and 5 output tokens.
 */
export function fakeProvider(name: ProviderType, overrides: Partial<ModelProvider> = {}): ModelProvider {
  return {
    name,
    isLocal: name === 'ollama',
    timeoutMs: 0,
    async listModels() {
      return [modelInfo(name, `${name}-model`)];
    },
    async getModelInfo(model) {
      return modelInfo(name, model);
    },
    async generate(req) {
      return buildResponse({
        request: req,
        info: modelInfo(name, req.model),
        content: `${name}:${req.model}`,
        usage: { inputTokens: 10, outputTokens: 5 },
        latencyMs: 1,
      });
    },
    async *generateStream() {
      yield 'one ';
      yield 'two';
    },
    async isAvailable() {
      return true;
    },
    async healthCheck() {
      return { available: true, detail: { provider: name } };
    },
    ...overrides,
  };
}

export async function collect(chunks: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of chunks) out.push(chunk);
  return out;
}
