/**
 * Streaming body readers.
 *
 * Ollama streams newline-delimited JSON; the cloud APIs stream
 * server-sent events. Both come down to "complete lines from a byte
 * stream". Leaving the loop early cancels the body, which closes the
 * connection and stops generation upstream.
 */

import { BackendError } from '../core/errors.js';
import { classifyFetchError, type HttpOptions } from './http.js';

/**
 * Complete lines from a response body. A body that fails part way
 * (dropped connection, timeout, cancel) throws a classified error.
 */
export async function* readLines(response: Response, opts: HttpOptions): AsyncGenerator<string> {
  const reader = response.body?.getReader();
  if (!reader) {
    throw new BackendError(`${opts.provider} returned no response body`, opts.provider, response.status);
  }

  const decoder = new TextDecoder();
  let buffer = '';
  let finished = false;

  // An errored stream cannot be cancelled, only released
  const read = async () => {
    try {
      return await reader.read();
    } catch (error) {
      finished = true;
      throw classifyFetchError(error, opts);
    }
  };

  try {
    while (true) {
      const { done, value } = await read();
      if (done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const trimmed = line.replace(/\r$/, '');
        if (trimmed) yield trimmed;
      }
    }

    buffer += decoder.decode();
    if (buffer.trim()) yield buffer.trim();
  } finally {
    if (!finished) await reader.cancel();
    reader.releaseLock();
  }
}

/**
 * SSE `data:` payloads, stopping at the OpenAI-style `[DONE]` marker.
 * Event names and comments are dropped; every provider here puts
 * what it needs in the data payload.
 */
export async function* readEventData(response: Response, opts: HttpOptions): AsyncGenerator<string> {
  for await (const line of readLines(response, opts)) {
    if (!line.startsWith('data:')) continue;

    const data = line.slice(5).trimStart();
    if (data === '[DONE]') return;
    if (data) yield data;
  }
}

/** Parse one JSON chunk; a malformed chunk fails the stream. */
export function parseChunk(data: string, provider: string): unknown {
  try {
    return JSON.parse(data);
  } catch (error) {
    throw new BackendError(`${provider} sent a malformed stream chunk`, provider, undefined, { cause: error });
  }
}
