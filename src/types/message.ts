/**
 * Saved conversations and per-user model preferences.
 *
 * A conversation is a transcript the caller wants to keep: which
 * model it ran against and the ordered messages. The store keeps
 * it as-is; nothing here talks to a backend.
 */

import type { ChatMessage } from './model.js';

export interface Conversation {
  id: string;
  title: string;
  model: string;
  provider: string;
  messages: ChatMessage[];
  createdAt: string;   // ISO 8601
  updatedAt: string;
  metadata: Record<string, unknown>;
}

/** Conversation listing entry: everything but the transcript */
export type ConversationSummary = Omit<Conversation, 'messages' | 'metadata'>;

export interface SaveConversationInput {
  /** Pass an existing id to overwrite that conversation */
  id?: string;
  title: string;
  model: string;
  provider: string;
  messages: ChatMessage[];
  metadata?: Record<string, unknown>;
}

export interface ModelPreference {
  userId: string;
  preferredModel: string;
  preferredProvider: string;
  settings: Record<string, unknown>;
  updatedAt: string;
}
