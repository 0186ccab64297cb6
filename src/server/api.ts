/**
 * API routes for modelgate.
 *
 * Two audiences, two prefixes:
 *   /api/*        model listing, generation, usage, conversations, health
 *   /api/admin/*  credentials, preferences, local model management
 *                 (token-protected)
 */

import { Hono, type Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { PROVIDER_TYPES, type UsageGroupBy } from '../types/index.js';
import type { Orchestrator } from '../core/orchestrator.js';
import type { HealthAggregator } from '../core/health.js';
import type { ProviderRegistry } from '../core/registry.js';
import type { Store } from '../db/index.js';
import { isOllamaProvider } from '../llm/index.js';
import { ConversationInputSchema, validate } from '../core/validation.js';
import {
  ProviderNotConfiguredError,
  ValidationError,
  toErrorDescriptor,
  type ErrorDescriptor,
} from '../core/errors.js';
import { createLogger } from '../core/logger.js';

const log = createLogger('api');

export interface APIDeps {
  orchestrator: Orchestrator;
  health: HealthAggregator;
  registry: ProviderRegistry;
  store: Store;
  /** Admin routes answer 401 while this is null */
  adminToken: string | null;
}

const STATUS_BY_KIND: Record<ErrorDescriptor['kind'], number> = {
  validation: 400,
  provider_not_configured: 404,
  model_not_found: 404,
  auth: 502,
  backend: 502,
  transient: 503,
  storage: 500,
  // Client closed the request (nginx convention)
  cancelled: 499,
  unknown: 500,
};

const CLOUD_TYPES = ['openai', 'anthropic', 'google', 'mistral'] as const;

const PageQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const GroupBy = z.enum(['model', 'provider', 'none']).default('model');

const CredentialBody = z.object({ apiKey: z.string().min(1, 'apiKey is required') });

const PreferenceBody = z.object({
  preferredModel: z.string().min(1),
  preferredProvider: z.string().min(1),
  settings: z.record(z.unknown()).default({}),
});

const PullBody = z.object({ model: z.string().min(1, 'model is required') });

const CompareBody = z.object({ models: z.unknown() }).passthrough();

function jsonError(kind: string, message: string, status: number): Response {
  return new Response(JSON.stringify({ error: { kind, message } }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function errorResponse(error: unknown): Response {
  const descriptor = toErrorDescriptor(error);
  const status = STATUS_BY_KIND[descriptor.kind];
  if (status >= 500 && descriptor.kind !== 'transient') {
    log.error(`${descriptor.kind}: ${descriptor.message}`);
  }
  return jsonError(descriptor.kind, descriptor.message, status);
}

async function readBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch (error) {
    throw new ValidationError('Request body must be valid JSON', [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

export function createAPI(deps: APIDeps) {
  const { orchestrator, health, registry, store, adminToken } = deps;
  const api = new Hono();

  api.onError((error) => errorResponse(error));

  api.notFound((c) => jsonError('not_found', `No route for ${c.req.method} ${c.req.path}`, 404));

  // ── Models ─────────────────────────────────────────────

  api.get('/api/models', async (c) => {
    const models = await orchestrator.listModels(
      { provider: c.req.query('provider'), capability: c.req.query('capability') },
      c.req.raw.signal
    );
    return c.json({ models });
  });

  api.get('/api/models/info', async (c) => {
    const model = await orchestrator.getModelInfo(
      c.req.query('model') ?? '',
      c.req.query('provider') ?? '',
      c.req.raw.signal
    );
    return c.json({ model });
  });

  // ── Generation ─────────────────────────────────────────

  /** Single generation. `stream: true` answers with SSE `chunk` events. */
  api.post('/api/generate', async (c) => {
    const body = await readBody(c);
    const signal = c.req.raw.signal;

    const wantsStream = typeof body === 'object' && body !== null && 'stream' in body && body.stream === true;
    if (!wantsStream) {
      const response = await orchestrator.generate(body, signal);
      return c.json(response);
    }

    // Validation and provider lookup happen here, before any bytes go out
    const chunks = orchestrator.stream(body, signal);

    return streamSSE(c, async (stream) => {
      try {
        for await (const content of chunks) {
          await stream.writeSSE({ event: 'chunk', data: JSON.stringify({ content }) });
        }
        await stream.writeSSE({ event: 'done', data: '{}' });
      } catch (error) {
        await stream.writeSSE({
          event: 'error',
          data: JSON.stringify({ error: toErrorDescriptor(error) }),
        });
      }
    });
  });

  /** Same prompt against several models; one result slot per model, in order */
  api.post('/api/compare', async (c) => {
    const { models, ...shared } = validate(CompareBody, await readBody(c), 'compare request');
    const results = await orchestrator.compare(models, shared, c.req.raw.signal);
    return c.json({ results });
  });

  // ── Usage ──────────────────────────────────────────────

  api.get('/api/usage', (c) => {
    const groupBy: UsageGroupBy = validate(GroupBy, c.req.query('group_by'), 'group_by');
    const stats = store.aggregate(
      { model: c.req.query('model'), provider: c.req.query('provider') },
      groupBy
    );
    return c.json({ stats });
  });

  // ── Conversations ──────────────────────────────────────

  api.post('/api/conversations', async (c) => {
    const input = validate(ConversationInputSchema, await readBody(c), 'conversation');
    const id = store.saveConversation(input);
    return c.json({ id }, 201);
  });

  api.get('/api/conversations', (c) => {
    const { limit, offset } = validate(PageQuery, c.req.query(), 'pagination');
    return c.json({ conversations: store.listConversations(limit, offset) });
  });

  api.get('/api/conversations/:id', (c) => {
    const conversation = store.getConversation(c.req.param('id'));
    if (!conversation) return jsonError('not_found', 'Conversation not found', 404);
    return c.json({ conversation });
  });

  api.delete('/api/conversations/:id', (c) => {
    if (!store.deleteConversation(c.req.param('id'))) {
      return jsonError('not_found', 'Conversation not found', 404);
    }
    return c.json({ ok: true });
  });

  // ── Status ─────────────────────────────────────────────

  api.get('/api/health', async (c) => {
    return c.json(await health.check(c.req.raw.signal));
  });

  api.get('/api/stats/usage', (c) => {
    return c.json({ stats: store.aggregate({}, 'model') });
  });

  /** Which families are registered, and how each one is doing */
  api.get('/api/config/providers', async (c) => {
    const report = await health.check(c.req.raw.signal);
    const providers = PROVIDER_TYPES.map(name => ({
      name,
      configured: registry.has(name),
      ...(report.providers[name] ? { health: report.providers[name] } : {}),
    }));
    return c.json({ providers });
  });

  // ── Admin routes ───────────────────────────────────────

  const adminAuth = createMiddleware(async (c, next) => {
    const token = c.req.header('Authorization')?.replace(/^Bearer\s+/i, '');
    if (!adminToken || token !== adminToken) {
      return jsonError('unauthorized', 'Unauthorized', 401);
    }
    await next();
  });

  api.use('/api/admin/*', adminAuth);

  /** Store a cloud credential; picked up on the next start */
  api.put('/api/admin/credentials/:provider', async (c) => {
    const provider = validate(z.enum(CLOUD_TYPES), c.req.param('provider'), 'provider');
    const { apiKey } = validate(CredentialBody, await readBody(c), 'credential');
    store.saveCredential(provider, apiKey);
    log.info(`Stored credential for ${provider}`);
    return c.json({ ok: true, provider, active: registry.has(provider) });
  });

  api.get('/api/admin/preferences/:userId', (c) => {
    const preference = store.getPreference(c.req.param('userId'));
    if (!preference) return jsonError('not_found', 'No preference stored', 404);
    return c.json({ preference });
  });

  api.put('/api/admin/preferences/:userId', async (c) => {
    const body = validate(PreferenceBody, await readBody(c), 'preference');
    const preference = store.savePreference({ userId: c.req.param('userId'), ...body });
    return c.json({ preference });
  });

  const localProvider = () => {
    const provider = registry.get('ollama');
    if (!isOllamaProvider(provider)) throw new ProviderNotConfiguredError('ollama');
    return provider;
  };

  api.post('/api/admin/ollama/pull', async (c) => {
    const { model } = validate(PullBody, await readBody(c), 'pull request');
    const result = await localProvider().pullModel(model, c.req.raw.signal);
    log.info(`Pulled ${model}: ${result.status}`);
    return c.json({ ok: true, model, status: result.status });
  });

  api.delete('/api/admin/ollama/models/:name', async (c) => {
    const name = c.req.param('name');
    await localProvider().deleteModel(name, c.req.raw.signal);
    log.info(`Deleted ${name}`);
    return c.json({ ok: true, model: name });
  });

  return api;
}
