import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { SCHEMA } from './schema.js';
import { StorageError, isModelGateError } from '../core/errors.js';
import { aggregateUsage } from '../core/accounting.js';
import { ChatMessageSchema } from '../core/validation.js';
import type {
  ChatMessage,
  Conversation,
  ConversationSummary,
  ModelPreference,
  NewUsageRecord,
  SaveConversationInput,
  UsageFilters,
  UsageGroupBy,
  UsageLedger,
  UsageRecord,
  UsageStats,
} from '../types/index.js';

export interface Store extends UsageLedger {
  listRecords(filters?: UsageFilters, limit?: number): UsageRecord[];

  /** Insert, or overwrite when `input.id` already exists. Returns the id. */
  saveConversation(input: SaveConversationInput): string;
  getConversation(id: string): Conversation | null;
  listConversations(limit?: number, offset?: number): ConversationSummary[];
  /** True when a conversation was removed */
  deleteConversation(id: string): boolean;

  saveCredential(provider: string, apiKey: string): void;
  getCredential(provider: string): string | null;
  listCredentialProviders(): string[];

  getPreference(userId: string): ModelPreference | null;
  savePreference(preference: Omit<ModelPreference, 'updatedAt'>): ModelPreference;

  close(): void;
}

// ── Row Shapes ─────────────────────────────────────────────

const UsageRow = z.object({
  id: z.string(),
  model: z.string(),
  provider: z.string(),
  input_tokens: z.number(),
  output_tokens: z.number(),
  total_tokens: z.number(),
  cost: z.number(),
  latency_ms: z.number(),
  status: z.enum(['success', 'error']),
  error: z.string().nullable(),
  timestamp: z.string(),
  metadata: z.string(),
});

const ConversationRow = z.object({
  id: z.string(),
  title: z.string(),
  model: z.string(),
  provider: z.string(),
  messages: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  metadata: z.string(),
});

const SummaryRow = ConversationRow.omit({ messages: true, metadata: true });

const CredentialRow = z.object({ api_key: z.string() });

const ProviderRow = z.object({ provider: z.string() });

const PreferenceRow = z.object({
  user_id: z.string(),
  preferred_model: z.string(),
  preferred_provider: z.string(),
  settings: z.string(),
  updated_at: z.string(),
});

const JsonObject = z.record(z.unknown());

const JsonMessages = z.array(ChatMessageSchema);

function parseJson<T extends z.ZodTypeAny>(text: string, schema: T, column: string): z.infer<T> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new StorageError(`Column ${column} holds malformed JSON`, { cause: error });
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new StorageError(`Column ${column} holds an unexpected value`);
  }
  return parsed.data;
}

function parseRow<T extends z.ZodTypeAny>(schema: T, row: unknown, table: string): z.infer<T> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new StorageError(`Unexpected row shape in ${table}`);
  }
  return parsed.data;
}

// ── Row Mappers ────────────────────────────────────────────

function rowToRecord(row: z.infer<typeof UsageRow>): UsageRecord {
  return {
    id: row.id,
    model: row.model,
    provider: row.provider,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    totalTokens: row.total_tokens,
    cost: row.cost,
    latencyMs: row.latency_ms,
    status: row.status,
    error: row.error,
    timestamp: row.timestamp,
    metadata: parseJson(row.metadata, JsonObject, 'usage_records.metadata'),
  };
}

function rowToSummary(row: z.infer<typeof SummaryRow>): ConversationSummary {
  return {
    id: row.id,
    title: row.title,
    model: row.model,
    provider: row.provider,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToConversation(row: z.infer<typeof ConversationRow>): Conversation {
  const messages: ChatMessage[] = parseJson(row.messages, JsonMessages, 'conversations.messages');
  return {
    ...rowToSummary(row),
    messages,
    metadata: parseJson(row.metadata, JsonObject, 'conversations.metadata'),
  };
}

function rowToPreference(row: z.infer<typeof PreferenceRow>): ModelPreference {
  return {
    userId: row.user_id,
    preferredModel: row.preferred_model,
    preferredProvider: row.preferred_provider,
    settings: parseJson(row.settings, JsonObject, 'model_preferences.settings'),
    updatedAt: row.updated_at,
  };
}

// ── Store ──────────────────────────────────────────────────

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (isModelGateError(error)) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Storage failure during ${operation}: ${reason}`, { cause: error });
  }
}

function whereClause(filters: UsageFilters): { sql: string; params: string[] } {
  const conditions: string[] = [];
  const params: string[] = [];

  if (filters.model) { conditions.push('model = ?'); params.push(filters.model); }
  if (filters.provider) { conditions.push('provider = ?'); params.push(filters.provider); }

  return {
    sql: conditions.length ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

/**
 * Open (or create) the database at `path` and apply the schema.
 * Pass `:memory:` for a throwaway database.
 */
export function createStore(path: string): Store {
  const db = guard('open', () => {
    if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
    const handle = new Database(path);
    handle.pragma('journal_mode = WAL');
    handle.pragma('foreign_keys = ON');
    handle.exec(SCHEMA);
    return handle;
  });

  function selectRecords(filters: UsageFilters, limit?: number): UsageRecord[] {
    const where = whereClause(filters);
    const limitSql = limit !== undefined ? 'LIMIT ?' : '';
    const params: Array<string | number> = limit !== undefined ? [...where.params, limit] : where.params;

    const rows = db.prepare(`
      SELECT * FROM usage_records ${where.sql}
      ORDER BY timestamp DESC, rowid DESC
      ${limitSql}
    `).all(...params);

    return rows.map(row => rowToRecord(parseRow(UsageRow, row, 'usage_records')));
  }

  return {
    // ── Usage Ledger ───────────────────────────────────────

    append(record: NewUsageRecord): UsageRecord {
      return guard('usage append', () => {
        const stored: UsageRecord = {
          ...record,
          id: randomUUID(),
          timestamp: record.timestamp ?? new Date().toISOString(),
        };

        db.prepare(`
          INSERT INTO usage_records
            (id, model, provider, input_tokens, output_tokens, total_tokens,
             cost, latency_ms, status, error, timestamp, metadata)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          stored.id,
          stored.model,
          stored.provider,
          stored.inputTokens,
          stored.outputTokens,
          stored.totalTokens,
          stored.cost,
          stored.latencyMs,
          stored.status,
          stored.error,
          stored.timestamp,
          JSON.stringify(stored.metadata)
        );

        return stored;
      });
    },

    aggregate(filters: UsageFilters = {}, groupBy: UsageGroupBy = 'model'): UsageStats[] {
      return guard('usage aggregate', () => aggregateUsage(selectRecords(filters), groupBy));
    },

    listRecords(filters: UsageFilters = {}, limit?: number): UsageRecord[] {
      return guard('usage list', () => selectRecords(filters, limit));
    },

    // ── Conversations ──────────────────────────────────────

    saveConversation(input: SaveConversationInput): string {
      return guard('conversation save', () => {
        const id = input.id ?? randomUUID();
        const now = new Date().toISOString();

        db.prepare(`
          INSERT INTO conversations (id, title, model, provider, messages, created_at, updated_at, metadata)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(id) DO UPDATE SET
            title = excluded.title,
            model = excluded.model,
            provider = excluded.provider,
            messages = excluded.messages,
            updated_at = excluded.updated_at,
            metadata = excluded.metadata
        `).run(
          id,
          input.title,
          input.model,
          input.provider,
          JSON.stringify(input.messages),
          now,
          now,
          JSON.stringify(input.metadata ?? {})
        );

        return id;
      });
    },

    getConversation(id: string): Conversation | null {
      return guard('conversation get', () => {
        const row = db.prepare('SELECT * FROM conversations WHERE id = ?').get(id);
        return row ? rowToConversation(parseRow(ConversationRow, row, 'conversations')) : null;
      });
    },

    listConversations(limit = 50, offset = 0): ConversationSummary[] {
      return guard('conversation list', () => {
        const rows = db.prepare(`
          SELECT id, title, model, provider, created_at, updated_at FROM conversations
          ORDER BY updated_at DESC, rowid DESC
          LIMIT ? OFFSET ?
        `).all(limit, offset);

        return rows.map(row => rowToSummary(parseRow(SummaryRow, row, 'conversations')));
      });
    },

    deleteConversation(id: string): boolean {
      return guard('conversation delete', () =>
        db.prepare('DELETE FROM conversations WHERE id = ?').run(id).changes > 0
      );
    },

    // ── Credentials ────────────────────────────────────────

    saveCredential(provider: string, apiKey: string): void {
      guard('credential save', () => {
        const now = new Date().toISOString();
        db.prepare(`
          INSERT INTO provider_credentials (provider, api_key, created_at, updated_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT(provider) DO UPDATE SET
            api_key = excluded.api_key,
            updated_at = excluded.updated_at
        `).run(provider, apiKey, now, now);
      });
    },

    getCredential(provider: string): string | null {
      return guard('credential get', () => {
        const row = db.prepare('SELECT api_key FROM provider_credentials WHERE provider = ?').get(provider);
        return row ? parseRow(CredentialRow, row, 'provider_credentials').api_key : null;
      });
    },

    listCredentialProviders(): string[] {
      return guard('credential list', () =>
        db.prepare('SELECT provider FROM provider_credentials ORDER BY provider')
          .all()
          .map(row => parseRow(ProviderRow, row, 'provider_credentials').provider)
      );
    },

    // ── Preferences ────────────────────────────────────────

    getPreference(userId: string): ModelPreference | null {
      return guard('preference get', () => {
        const row = db.prepare('SELECT * FROM model_preferences WHERE user_id = ?').get(userId);
        return row ? rowToPreference(parseRow(PreferenceRow, row, 'model_preferences')) : null;
      });
    },

    savePreference(preference: Omit<ModelPreference, 'updatedAt'>): ModelPreference {
      return guard('preference save', () => {
        const stored: ModelPreference = { ...preference, updatedAt: new Date().toISOString() };
        db.prepare(`
          INSERT INTO model_preferences (user_id, preferred_model, preferred_provider, settings, updated_at)
          VALUES (?, ?, ?, ?, ?)
          ON CONFLICT(user_id) DO UPDATE SET
            preferred_model = excluded.preferred_model,
            preferred_provider = excluded.preferred_provider,
            settings = excluded.settings,
            updated_at = excluded.updated_at
        `).run(
          stored.userId,
          stored.preferredModel,
          stored.preferredProvider,
          JSON.stringify(stored.settings),
          stored.updatedAt
        );
        return stored;
      });
    },

    close(): void {
      guard('close', () => db.close());
    },
  };
}
