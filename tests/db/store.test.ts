import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createStore, type Store } from '../../src/db/index.js';
import type { NewUsageRecord } from '../../src/types/index.js';

let store: Store;

beforeEach(() => {
  store = createStore(':memory:');
});

afterEach(() => {
  store.close();
  vi.useRealTimers();
});

function usage(fields: Partial<NewUsageRecord> = {}): NewUsageRecord {
  return {
    model: 'gpt-4o-mini',
    provider: 'openai',
    inputTokens: 100,
    outputTokens: 50,
    totalTokens: 150,
    cost: 0.000045,
    latencyMs: 120,
    status: 'success',
    error: null,
    metadata: {},
    ...fields,
  };
}

describe('usage ledger', () => {
  it('stores an appended record as given', () => {
    const stored = store.append(usage({ timestamp: '2026-03-01T10:00:00.000Z', metadata: { attempts: 2 } }));

    expect(stored.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(store.listRecords()).toEqual([stored]);
    expect(stored).toMatchObject({ timestamp: '2026-03-01T10:00:00.000Z', metadata: { attempts: 2 } });
  });

  it('stamps the time when none is given', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-05-05T05:05:05.000Z'));

    expect(store.append(usage()).timestamp).toBe('2026-05-05T05:05:05.000Z');
  });

  it('lists newest first and filters', () => {
    store.append(usage({ timestamp: '2026-01-01T00:00:00.000Z' }));
    store.append(usage({ model: 'llama3', provider: 'ollama', cost: 0, timestamp: '2026-01-03T00:00:00.000Z' }));
    store.append(usage({ timestamp: '2026-01-02T00:00:00.000Z', status: 'error', error: 'busy' }));

    expect(store.listRecords().map(r => r.timestamp)).toEqual([
      '2026-01-03T00:00:00.000Z',
      '2026-01-02T00:00:00.000Z',
      '2026-01-01T00:00:00.000Z',
    ]);
    expect(store.listRecords({ provider: 'openai' }, 1).map(r => r.error)).toEqual(['busy']);
    expect(store.listRecords({ model: 'llama3', provider: 'openai' })).toEqual([]);
  });

  it('aggregates what it stored', () => {
    store.append(usage());
    store.append(usage({ status: 'error', error: 'busy', inputTokens: 0, outputTokens: 0, totalTokens: 0, cost: 0 }));
    store.append(usage({ model: 'llama3', provider: 'ollama', cost: 0 }));

    expect(store.aggregate({ provider: 'openai' })).toMatchObject([
      {
        model: 'gpt-4o-mini',
        provider: 'openai',
        totalRequests: 2,
        totalTokens: 150,
        totalCost: 0.000045,
        errorCount: 1,
      },
    ]);
    expect(store.aggregate({}, 'provider').map(s => [s.provider, s.totalRequests])).toEqual([
      ['openai', 2],
      ['ollama', 1],
    ]);
  });
});

describe('conversations', () => {
  const messages = [
    { role: 'user' as const, content: 'What is 2+2?' },
    { role: 'assistant' as const, content: '4' },
  ];

  it('saves and loads a transcript', () => {
    const id = store.saveConversation({ title: 'Maths', model: 'llama3', provider: 'ollama', messages });

    expect(store.getConversation(id)).toMatchObject({
      id,
      title: 'Maths',
      model: 'llama3',
      provider: 'ollama',
      messages,
      metadata: {},
    });
    expect(store.getConversation('nope')).toBeNull();
  });

  it('overwrites when saved again under the same id', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    const id = store.saveConversation({ title: 'Draft', model: 'm', provider: 'openai', messages: [] });

    vi.setSystemTime(new Date('2026-01-02T00:00:00.000Z'));
    expect(store.saveConversation({ id, title: 'Final', model: 'm', provider: 'openai', messages })).toBe(id);

    expect(store.getConversation(id)).toMatchObject({
      title: 'Final',
      messages,
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-02T00:00:00.000Z',
    });
  });

  it('lists summaries, most recently updated first', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    const first = store.saveConversation({ title: 'First', model: 'm', provider: 'ollama', messages });
    vi.setSystemTime(new Date('2026-01-02T00:00:00.000Z'));
    store.saveConversation({ title: 'Second', model: 'm', provider: 'ollama', messages });
    vi.setSystemTime(new Date('2026-01-03T00:00:00.000Z'));
    store.saveConversation({ id: first, title: 'First again', model: 'm', provider: 'ollama', messages });

    const list = store.listConversations();
    expect(list.map(c => c.title)).toEqual(['First again', 'Second']);
    expect(list[0]).not.toHaveProperty('messages');
    expect(store.listConversations(1, 1).map(c => c.title)).toEqual(['Second']);
  });

  it('deletes', () => {
    const id = store.saveConversation({ title: 'Gone', model: 'm', provider: 'ollama', messages });

    expect(store.deleteConversation(id)).toBe(true);
    expect(store.deleteConversation(id)).toBe(false);
    expect(store.getConversation(id)).toBeNull();
  });
});

describe('credentials and preferences', () => {
  it('keeps one key per provider', () => {
    store.saveCredential('openai', 'test-secret');
    store.saveCredential('openai', 'test-secret-2');
    store.saveCredential('anthropic', 'test-secret');

    expect(store.getCredential('openai')).toBe('test-secret-2');
    expect(store.getCredential('google')).toBeNull();
    expect(store.listCredentialProviders()).toEqual(['anthropic', 'openai']);
  });

  it('saves and replaces a preference', () => {
    expect(store.getPreference('u1')).toBeNull();

    store.savePreference({ userId: 'u1', preferredModel: 'a', preferredProvider: 'ollama', settings: {} });
    const saved = store.savePreference({
      userId: 'u1',
      preferredModel: 'gpt-4o',
      preferredProvider: 'openai',
      settings: { temperature: 0.2 },
    });

    expect(store.getPreference('u1')).toEqual(saved);
    expect(saved).toMatchObject({ preferredModel: 'gpt-4o', settings: { temperature: 0.2 } });
  });
});
