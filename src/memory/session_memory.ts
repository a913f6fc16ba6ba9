/**
 * @fileoverview Session layer: append-only message history per session.
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { ValidationError } from '../core/errors.js';
import { createMutex } from '../utils/async.js';
import { keywordScore } from './in_memory_store.js';
import {
  MessageDraftSchema,
  type DraftValidation,
  type MemoryLayer,
  type MemoryStore,
  type MessageDraft,
  type SessionMessage,
  type SessionSearchQuery,
} from './types.js';
import { describeIssues } from './validation.js';

const SESSION_PREFIX = 'session:';

export type SessionLayerTypes = {
  add: MessageDraft;
  added: SessionMessage;
  read: SessionMessage[];
  query: SessionSearchQuery;
  hit: SessionMessage;
  check: unknown;
  verdict: DraftValidation;
};

export class SessionMemory implements MemoryLayer<SessionLayerTypes> {
  readonly layer = 'session' as const;
  private readonly mutex = createMutex();

  constructor(
    private readonly store: MemoryStore<SessionMessage[]>,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Append a message; malformed drafts raise ValidationError. */
  add(sessionId: string, draft: MessageDraft): Promise<SessionMessage> {
    const parsed = MessageDraftSchema.safeParse(draft);
    if (!parsed.success) {
      const [first] = describeIssues(parsed.error);
      return Promise.reject(new ValidationError('message', 'a well-formed message', first ?? 'invalid message'));
    }
    const message: SessionMessage = { ...parsed.data, sessionId, timestamp: this.clock.now() };
    return this.mutex.run(async () => {
      const history = (await this.store.get(SESSION_PREFIX + sessionId)) ?? [];
      await this.store.add(SESSION_PREFIX + sessionId, [...history, message]);
      return message;
    });
  }

  /** Full history, oldest first. Unknown sessions read as empty. */
  async get(sessionId: string): Promise<SessionMessage[]> {
    const history = await this.mutex.run(() => this.store.get(SESSION_PREFIX + sessionId));
    return history ? [...history] : [];
  }

  /** The last `last` messages (all of them when omitted). */
  async getHistory(sessionId: string, options: { last?: number } = {}): Promise<SessionMessage[]> {
    const history = await this.get(sessionId);
    if (options.last === undefined) return history;
    if (options.last <= 0) return [];
    return history.slice(-options.last);
  }

  /** Messages matching the query terms, best match first, newer first on ties. */
  async search(query: SessionSearchQuery): Promise<SessionMessage[]> {
    const prefix = query.sessionId === undefined ? SESSION_PREFIX : SESSION_PREFIX + query.sessionId;
    const sessions = await this.mutex.run(() => this.store.entries(prefix));
    const scored: Array<{ message: SessionMessage; score: number }> = [];
    for (const [key, history] of sessions) {
      if (query.sessionId !== undefined && key !== SESSION_PREFIX + query.sessionId) continue;
      for (const message of history) {
        const score = keywordScore(query.text, message.content);
        if (score > 0) scored.push({ message, score });
      }
    }
    scored.sort((a, b) => b.score - a.score || b.message.timestamp - a.message.timestamp);
    const limited = query.limit === undefined ? scored : scored.slice(0, Math.max(0, query.limit));
    return limited.map((entry) => entry.message);
  }

  /** Check a draft without storing it. Never throws. */
  validate(sessionId: string, draft: unknown): DraftValidation {
    const errors: string[] = [];
    if (sessionId.trim().length === 0) {
      errors.push('sessionId must not be empty');
    }
    const parsed = MessageDraftSchema.safeParse(draft);
    if (!parsed.success) {
      errors.push(...describeIssues(parsed.error));
    }
    return { isValid: errors.length === 0, errors };
  }

  async clear(sessionId: string): Promise<boolean> {
    return this.mutex.run(() => this.store.delete(SESSION_PREFIX + sessionId));
  }
}
