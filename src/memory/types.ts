/**
 * @fileoverview Memory types
 *
 * Four layers (session, window, deep, fact) over stores that share one
 * interface. Every layer works on the in-process store alone; a remote
 * backend only mirrors it.
 */

import { z } from 'zod';

export type Awaitable<T> = T | Promise<T>;

// ============================================================================
// STORE
// ============================================================================

export interface MemoryStoreAddOptions {
  ttlMs?: number;
}

export interface MemorySearchHit<T> {
  key: string;
  value: T;
  score: number;
}

export interface MemoryStore<T> {
  add(key: string, value: T, options?: MemoryStoreAddOptions): Promise<void>;
  get(key: string): Promise<T | undefined>;
  /** Keyword search over stored values, best match first. */
  search(query: string, limit: number, keyPrefix?: string): Promise<Array<MemorySearchHit<T>>>;
  delete(key: string): Promise<boolean>;
  /** Live entries whose key starts with `prefix`, least recently used first. */
  entries(prefix?: string): Promise<Array<[string, T]>>;
}

export interface BackendInfo {
  local: string;
  remote: string | null;
  /** false once a remote call has failed, until the next one succeeds */
  remoteHealthy: boolean;
  localEntries: number;
}

// ============================================================================
// LAYER CONTRACT
// ============================================================================

export type MemoryLayerName = 'session' | 'window' | 'deep' | 'fact';

/** Result of checking a draft before it is stored. Never thrown. */
export interface DraftValidation {
  isValid: boolean;
  errors: string[];
}

export interface LayerTypes {
  add: unknown;
  added: unknown;
  read: unknown;
  query: unknown;
  hit: unknown;
  check: unknown;
  verdict: unknown;
}

export interface MemoryLayer<T extends LayerTypes> {
  readonly layer: MemoryLayerName;
  add(key: string, value: T['add']): Awaitable<T['added']>;
  get(key: string): Awaitable<T['read']>;
  search(query: T['query']): Awaitable<Array<T['hit']>>;
  validate(key: string, value: T['check']): T['verdict'];
}

// ============================================================================
// SESSION
// ============================================================================

export const MESSAGE_ROLES = ['system', 'user', 'assistant', 'tool'] as const;

export const MessageDraftSchema = z.object({
  role: z.enum(MESSAGE_ROLES),
  content: z.string().min(1, 'content must not be empty'),
  metadata: z.record(z.unknown()).optional(),
});

export type MessageDraft = z.infer<typeof MessageDraftSchema>;

export interface SessionMessage extends MessageDraft {
  sessionId: string;
  timestamp: number;
}

export interface SessionSearchQuery {
  text: string;
  sessionId?: string;
  limit?: number;
}

export interface WindowSearchQuery {
  sessionId: string;
  windowMs?: number;
}

// ============================================================================
// DEEP
// ============================================================================

export const DeepEntryDraftSchema = z.object({
  content: z.string().min(1, 'content must not be empty'),
  tags: z.array(z.string().min(1)).default([]),
  importance: z.number().min(0).max(1).default(0.5),
});

export type DeepEntryDraft = z.input<typeof DeepEntryDraftSchema>;

export interface DeepEntry {
  key: string;
  content: string;
  tags: string[];
  importance: number;
  createdAt: number;
}

export interface DeepSearchQuery {
  text?: string;
  tags?: string[];
  limit?: number;
}

export interface DeepSearchResult {
  entry: DeepEntry;
  score: number;
}

/**
 * Scores how well an entry answers a query. 0 means "not relevant"; higher
 * is better. Swapping this for an embedding similarity changes no caller.
 */
export type RelevanceFunction = (entry: DeepEntry, query: DeepSearchQuery) => number;
