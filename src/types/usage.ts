/**
 * Usage accounting types.
 *
 * One UsageRecord per backend call. UsageStats is never stored;
 * it is computed from records every time someone asks.
 */

export type UsageStatus = 'success' | 'error';

export type UsageGroupBy = 'model' | 'provider' | 'none';

export interface UsageRecord {
  id: string;
  model: string;
  provider: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  cost: number;
  latencyMs: number;
  status: UsageStatus;
  /** Error message for failed calls */
  error: string | null;
  timestamp: string;   // ISO 8601
  metadata: Record<string, unknown>;
}

export type NewUsageRecord = Omit<UsageRecord, 'id' | 'timestamp'> & {
  timestamp?: string;
};

export interface UsageFilters {
  model?: string;
  provider?: string;
}

export interface UsageStats {
  /** Set when grouped by model */
  model: string | null;
  /** Set when grouped by model or provider */
  provider: string | null;
  totalRequests: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  totalCost: number;
  averageLatencyMs: number;
  errorCount: number;
  lastUsed: string | null;
}

/**
 * The append-only usage store.
 * Implementations must keep one row per append under concurrent callers.
 */
export interface UsageLedger {
  append(record: NewUsageRecord): UsageRecord;
  aggregate(filters?: UsageFilters, groupBy?: UsageGroupBy): UsageStats[];
}
