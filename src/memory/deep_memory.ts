/**
 * @fileoverview Deep layer: durable keyed knowledge, searchable by keyword
 * and tag. Ranking is a pluggable RelevanceFunction; ties go to the more
 * important, then the more recent entry.
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { ValidationError } from '../core/errors.js';
import { hasCriteria, keywordRelevance } from './relevance.js';
import {
  DeepEntryDraftSchema,
  type DeepEntry,
  type DeepEntryDraft,
  type DeepSearchQuery,
  type DeepSearchResult,
  type DraftValidation,
  type MemoryLayer,
  type MemoryStore,
  type RelevanceFunction,
} from './types.js';
import { describeIssues } from './validation.js';

const DEEP_PREFIX = 'deep:';
const DEFAULT_LIMIT = 10;

export type DeepLayerTypes = {
  add: DeepEntryDraft;
  added: DeepEntry;
  read: DeepEntry | undefined;
  query: DeepSearchQuery;
  hit: DeepSearchResult;
  check: unknown;
  verdict: DraftValidation;
};

export interface DeepMemoryOptions {
  relevance?: RelevanceFunction;
  clock?: Clock;
}

export class DeepMemory implements MemoryLayer<DeepLayerTypes> {
  readonly layer = 'deep' as const;
  private readonly relevance: RelevanceFunction;
  private readonly clock: Clock;

  constructor(
    private readonly store: MemoryStore<DeepEntry>,
    options: DeepMemoryOptions = {},
  ) {
    this.relevance = options.relevance ?? keywordRelevance;
    this.clock = options.clock ?? systemClock;
  }

  /** Store (or replace) an entry. Malformed drafts raise ValidationError. */
  async add(key: string, draft: DeepEntryDraft): Promise<DeepEntry> {
    if (key.trim().length === 0) {
      throw new ValidationError('key', 'a non-empty key', JSON.stringify(key));
    }
    const parsed = DeepEntryDraftSchema.safeParse(draft);
    if (!parsed.success) {
      const [first] = describeIssues(parsed.error);
      throw new ValidationError(`deep entry ${key}`, 'a well-formed entry', first ?? 'invalid entry');
    }
    const entry: DeepEntry = { key, ...parsed.data, createdAt: this.clock.now() };
    await this.store.add(DEEP_PREFIX + key, entry);
    return entry;
  }

  get(key: string): Promise<DeepEntry | undefined> {
    return this.store.get(DEEP_PREFIX + key);
  }

  async search(query: DeepSearchQuery): Promise<DeepSearchResult[]> {
    const limit = query.limit ?? DEFAULT_LIMIT;
    const filtering = hasCriteria(query);
    const results: DeepSearchResult[] = [];
    for (const [, entry] of await this.store.entries(DEEP_PREFIX)) {
      const score = this.relevance(entry, query);
      if (filtering && score <= 0) continue;
      results.push({ entry, score });
    }
    results.sort(
      (a, b) => b.score - a.score || b.entry.importance - a.entry.importance || b.entry.createdAt - a.entry.createdAt,
    );
    return results.slice(0, Math.max(0, limit));
  }

  async delete(key: string): Promise<boolean> {
    return this.store.delete(DEEP_PREFIX + key);
  }

  /** Check a draft without storing it. Never throws. */
  validate(key: string, draft: unknown): DraftValidation {
    const errors: string[] = [];
    if (key.trim().length === 0) {
      errors.push('key must not be empty');
    }
    const parsed = DeepEntryDraftSchema.safeParse(draft);
    if (!parsed.success) {
      errors.push(...describeIssues(parsed.error));
    }
    return { isValid: errors.length === 0, errors };
  }
}
