/**
 * Usage aggregation.
 *
 * Stats are always recomputed from records, never kept as running
 * counters, so a summary can't drift from the rows it describes.
 */

import type { UsageGroupBy, UsageRecord, UsageStats } from '../types/index.js';

const COST_PRECISION = 1e8;

type Bucket = {
  model: string | null;
  provider: string | null;
  records: UsageRecord[];
};

function bucketOf(record: UsageRecord, groupBy: UsageGroupBy): Pick<Bucket, 'model' | 'provider'> {
  switch (groupBy) {
    case 'model':
      return { model: record.model, provider: record.provider };
    case 'provider':
      return { model: null, provider: record.provider };
    case 'none':
      return { model: null, provider: null };
  }
}

function summarize(bucket: Bucket): UsageStats {
  const { records } = bucket;
  let inputTokens = 0;
  let outputTokens = 0;
  let totalTokens = 0;
  let cost = 0;
  let latency = 0;
  let errors = 0;
  let lastUsed: string | null = null;

  for (const r of records) {
    inputTokens += r.inputTokens;
    outputTokens += r.outputTokens;
    totalTokens += r.totalTokens;
    cost += r.cost;
    latency += r.latencyMs;
    if (r.status === 'error') errors++;
    if (lastUsed === null || r.timestamp > lastUsed) lastUsed = r.timestamp;
  }

  return {
    model: bucket.model,
    provider: bucket.provider,
    totalRequests: records.length,
    totalInputTokens: inputTokens,
    totalOutputTokens: outputTokens,
    totalTokens,
    totalCost: Math.round(cost * COST_PRECISION) / COST_PRECISION,
    averageLatencyMs: records.length > 0 ? latency / records.length : 0,
    errorCount: errors,
    lastUsed,
  };
}

function compareKeys(a: string | null, b: string | null): number {
  const x = a ?? '';
  const y = b ?? '';
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Group records and total each group.
 * Busiest group first; ties broken by model, then provider.
 */
export function aggregateUsage(
  records: readonly UsageRecord[],
  groupBy: UsageGroupBy = 'model'
): UsageStats[] {
  const buckets = new Map<string, Bucket>();

  for (const record of records) {
    const { model, provider } = bucketOf(record, groupBy);
    const key = JSON.stringify([model, provider]);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { model, provider, records: [] };
      buckets.set(key, bucket);
    }
    bucket.records.push(record);
  }

  return [...buckets.values()]
    .map(summarize)
    .sort((a, b) =>
      b.totalRequests - a.totalRequests
      || compareKeys(a.model, b.model)
      || compareKeys(a.provider, b.provider)
    );
}
