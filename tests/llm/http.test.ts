import { describe, it, expect } from 'vitest';
import { classifyFetchError, classifyStatus, combineSignals, probe, sendJson } from '../../src/llm/http.js';
import { z } from 'zod';
import { readEventData, readLines } from '../../src/llm/stream.js';
import {
  BackendError,
  CancelledError,
  ModelNotFoundError,
  TransientError,
} from '../../src/core/errors.js';
import { collect, stubFetch, textResponse } from '../helpers.js';

describe('classifyStatus', () => {
  const opts = { provider: 'openai', model: 'gpt-4o' };

  it.each([
    { status: 401, kind: 'auth' },
    { status: 403, kind: 'auth' },
    { status: 404, kind: 'model_not_found' },
    { status: 408, kind: 'transient' },
    { status: 409, kind: 'transient' },
    { status: 425, kind: 'transient' },
    { status: 429, kind: 'transient' },
    { status: 500, kind: 'transient' },
    { status: 502, kind: 'transient' },
    { status: 400, kind: 'backend' },
    { status: 422, kind: 'backend' },
  ])('maps $status to $kind', ({ status, kind }) => {
    expect(classifyStatus(status, '', opts).kind).toBe(kind);
  });

  it('names the model on a 404', () => {
    const error = classifyStatus(404, '', opts);
    expect(error).toBeInstanceOf(ModelNotFoundError);
    expect(error.message).toBe('Model "gpt-4o" not found on openai');
  });

  it('treats a 404 without a model as a backend error', () => {
    const error = classifyStatus(404, 'Not Found', { provider: 'google' });
    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe('google error (404): Not Found');
  });
});

describe('classifyFetchError', () => {
  it('reports a caller abort as cancelled', () => {
    const controller = new AbortController();
    controller.abort();
    const error = classifyFetchError(Object.assign(new Error('aborted'), { name: 'AbortError' }), {
      provider: 'openai',
      signal: controller.signal,
    });
    expect(error).toBeInstanceOf(CancelledError);
  });

  it('reports a timeout as transient', () => {
    const error = classifyFetchError(Object.assign(new Error('timed out'), { name: 'TimeoutError' }), {
      provider: 'openai',
      timeoutMs: 50,
    });
    expect(error).toBeInstanceOf(TransientError);
    expect(error.message).toBe('openai request timed out after 50ms');
  });
});

describe('combineSignals', () => {
  it('returns undefined when there is nothing to combine', () => {
    expect(combineSignals(undefined, 0)).toBeUndefined();
  });

  it('passes a lone caller signal through', () => {
    const controller = new AbortController();
    expect(combineSignals(controller.signal)).toBe(controller.signal);
  });

  it('aborts when the caller aborts', () => {
    const controller = new AbortController();
    const combined = combineSignals(controller.signal, 60_000);
    controller.abort();
    expect(combined?.aborted).toBe(true);
  });
});

describe('sendJson', () => {
  it('treats a successful answer that is not JSON as a backend error', async () => {
    stubFetch(() => textResponse('<html>proxy login</html>', 200));

    const sending = sendJson('https://api.example.test/v1/models', { method: 'GET' }, z.object({}), {
      provider: 'openai',
    });

    await expect(sending).rejects.toBeInstanceOf(BackendError);
    await expect(sending).rejects.toThrow('openai returned a body that is not JSON');
  });
});

describe('probe', () => {
  it('counts any HTTP answer as reachable', async () => {
    stubFetch(() => textResponse('', 404));
    expect(await probe('https://api.example.test', { provider: 'openai' })).toBe(true);
  });
});

describe('stream readers', () => {
  it('reassembles lines split across chunks', async () => {
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"a":'));
        controller.enqueue(encoder.encode('1}\r\n{"b"'));
        controller.enqueue(encoder.encode(':2}'));
        controller.close();
      },
    });

    const lines = await collect(readLines(new Response(body), { provider: 'ollama' }));

    expect(lines).toEqual(['{"a":1}', '{"b":2}']);
  });

  it('keeps only data payloads from server-sent events', async () => {
    const response = new Response(': comment\nevent: ping\ndata: first\n\ndata:second\n\ndata: [DONE]\n\ndata: after\n\n');
    expect(await collect(readEventData(response, { provider: 'openai' }))).toEqual(['first', 'second']);
  });

  it('classifies a body that breaks off part way', async () => {
    let sent = false;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        if (sent) {
          controller.error(new TypeError('terminated'));
          return;
        }
        sent = true;
        controller.enqueue(new TextEncoder().encode('data: {"a":1}\n\n'));
      },
    });
    const seen: string[] = [];

    const reading = (async () => {
      for await (const data of readEventData(new Response(body), { provider: 'openai' })) seen.push(data);
    })();

    await expect(reading).rejects.toThrow(new TransientError('openai unreachable: terminated'));
    await expect(reading).rejects.toBeInstanceOf(TransientError);
    expect(seen).toEqual(['{"a":1}']);
  });

  it('reports a cancelled read as cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const body = new ReadableStream<Uint8Array>({
      pull(stream) {
        stream.error(new TypeError('aborted'));
      },
    });

    await expect(collect(readLines(new Response(body), { provider: 'ollama', signal: controller.signal })))
      .rejects.toBeInstanceOf(CancelledError);
  });
});
