import { describe, it, expect } from 'vitest';
import { aggregateUsage } from '../../src/core/accounting.js';
import type { UsageRecord } from '../../src/types/index.js';

let seq = 0;

function record(fields: Partial<UsageRecord> & Pick<UsageRecord, 'model' | 'provider'>): UsageRecord {
  seq++;
  return {
    id: `r${seq}`,
    inputTokens: 10,
    outputTokens: 5,
    totalTokens: 15,
    cost: 0,
    latencyMs: 100,
    status: 'success',
    error: null,
    timestamp: `2026-01-01T00:00:0${seq % 10}.000Z`,
    metadata: {},
    ...fields,
  };
}

describe('aggregateUsage', () => {
  it('returns nothing for no records', () => {
    expect(aggregateUsage([])).toEqual([]);
  });

  it('groups by model and provider, busiest first', () => {
    const records = [
      record({ model: 'gpt-4o-mini', provider: 'openai', cost: 0.001, latencyMs: 100, timestamp: '2026-01-01T00:00:01.000Z' }),
      record({ model: 'llama3', provider: 'ollama', latencyMs: 50 }),
      record({ model: 'gpt-4o-mini', provider: 'openai', cost: 0.002, latencyMs: 300, timestamp: '2026-01-01T00:00:03.000Z' }),
      record({
        model: 'gpt-4o-mini',
        provider: 'openai',
        inputTokens: 0,
        outputTokens: 0,
        totalTokens: 0,
        latencyMs: 200,
        status: 'error',
        error: 'busy',
        timestamp: '2026-01-01T00:00:02.000Z',
      }),
    ];

    const [openai, ollama] = aggregateUsage(records, 'model');

    expect(openai).toEqual({
      model: 'gpt-4o-mini',
      provider: 'openai',
      totalRequests: 3,
      totalInputTokens: 20,
      totalOutputTokens: 10,
      totalTokens: 30,
      totalCost: 0.003,
      averageLatencyMs: 200,
      errorCount: 1,
      lastUsed: '2026-01-01T00:00:03.000Z',
    });
    expect(ollama).toMatchObject({ model: 'llama3', provider: 'ollama', totalRequests: 1, totalCost: 0 });
  });

  it('keeps the same model name on two providers apart', () => {
    const stats = aggregateUsage([
      record({ model: 'shared', provider: 'openai' }),
      record({ model: 'shared', provider: 'mistral' }),
    ]);

    expect(stats.map(s => [s.model, s.provider])).toEqual([
      ['shared', 'mistral'],
      ['shared', 'openai'],
    ]);
  });

  it('groups by provider only', () => {
    const stats = aggregateUsage([
      record({ model: 'a', provider: 'openai' }),
      record({ model: 'b', provider: 'openai' }),
      record({ model: 'c', provider: 'google' }),
    ], 'provider');

    expect(stats.map(s => [s.model, s.provider, s.totalRequests])).toEqual([
      [null, 'openai', 2],
      [null, 'google', 1],
    ]);
  });

  it('totals everything into one row', () => {
    const stats = aggregateUsage([
      record({ model: 'a', provider: 'openai', totalTokens: 15 }),
      record({ model: 'c', provider: 'google', totalTokens: 7 }),
    ], 'none');

    expect(stats).toHaveLength(1);
    expect(stats[0]).toMatchObject({ model: null, provider: null, totalRequests: 2, totalTokens: 22 });
  });

  it('matches a recomputation from the same records', () => {
    const records = Array.from({ length: 7 }, (_, i) =>
      record({ model: i % 2 ? 'a' : 'b', provider: 'openai', inputTokens: i, cost: 0.0001 * i })
    );

    const totals = aggregateUsage(records, 'none')[0];
    const byModel = aggregateUsage(records, 'model');

    expect(totals?.totalInputTokens).toBe(records.reduce((sum, r) => sum + r.inputTokens, 0));
    expect(byModel.reduce((sum, s) => sum + s.totalRequests, 0)).toBe(records.length);
    expect(byModel.reduce((sum, s) => sum + s.totalInputTokens, 0)).toBe(21);
  });
});
