/**
 * SQLite schema for modelgate.
 *
 * One append-only usage ledger plus the small amount of state the
 * service keeps for callers: saved conversations, stored backend
 * credentials and per-user model preferences.
 */

export const SCHEMA = `
  PRAGMA journal_mode = WAL;
  PRAGMA foreign_keys = ON;

  CREATE TABLE IF NOT EXISTS usage_records (
    id            TEXT PRIMARY KEY,
    model         TEXT NOT NULL,
    provider      TEXT NOT NULL,
    input_tokens  INTEGER NOT NULL DEFAULT 0,
    output_tokens INTEGER NOT NULL DEFAULT 0,
    total_tokens  INTEGER NOT NULL DEFAULT 0,
    cost          REAL NOT NULL DEFAULT 0,
    latency_ms    REAL NOT NULL DEFAULT 0,
    status        TEXT NOT NULL DEFAULT 'success' CHECK (status IN ('success', 'error')),
    error         TEXT,
    timestamp     TEXT NOT NULL,
    metadata      TEXT NOT NULL DEFAULT '{}'   -- JSON object
  );

  -- Usage queries filter by model and/or provider
  CREATE INDEX IF NOT EXISTS idx_usage_model_provider
    ON usage_records(model, provider);

  CREATE INDEX IF NOT EXISTS idx_usage_timestamp
    ON usage_records(timestamp DESC);

  CREATE TABLE IF NOT EXISTS conversations (
    id         TEXT PRIMARY KEY,
    title      TEXT NOT NULL,
    model      TEXT NOT NULL,
    provider   TEXT NOT NULL,
    messages   TEXT NOT NULL DEFAULT '[]',   -- JSON array of {role, content}
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    metadata   TEXT NOT NULL DEFAULT '{}'
  );

  CREATE INDEX IF NOT EXISTS idx_conversations_updated
    ON conversations(updated_at DESC);

  CREATE TABLE IF NOT EXISTS provider_credentials (
    provider   TEXT PRIMARY KEY,
    api_key    TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS model_preferences (
    user_id            TEXT PRIMARY KEY,
    preferred_model    TEXT NOT NULL,
    preferred_provider TEXT NOT NULL,
    settings           TEXT NOT NULL DEFAULT '{}',
    updated_at         TEXT NOT NULL
  );
`;
