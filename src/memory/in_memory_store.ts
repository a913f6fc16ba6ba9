/**
 * @fileoverview Zero-dependency memory store
 *
 * LRU-bounded, optional per-entry TTL, keyword search over the serialised
 * value. A per-instance mutex keeps read-modify-write sequences atomic.
 */

import { LruStore } from '../performance/lru_store.js';
import { createMutex, type Mutex } from '../utils/async.js';
import { stableStringify } from '../utils/hashing.js';
import type { MemorySearchHit, MemoryStore, MemoryStoreAddOptions } from './types.js';

export interface InMemoryStoreOptions {
  /** Default: 10000 */
  maxEntries?: number;
  /** Default TTL for entries added without one. */
  ttlMs?: number;
  now?: () => number;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/** Fraction of query terms found in the text; 1 for an empty query. */
export function keywordScore(query: string, text: string): number {
  const terms = tokenize(query);
  if (terms.length === 0) return 1;
  const haystack = new Set(tokenize(text));
  return terms.filter((term) => haystack.has(term)).length / terms.length;
}

export class InMemoryStore<T> implements MemoryStore<T> {
  readonly kind = 'in-memory';
  private readonly lru: LruStore<T>;
  private readonly mutex: Mutex = createMutex();

  constructor(options: InMemoryStoreOptions = {}) {
    this.lru = new LruStore<T>({
      maxSize: options.maxEntries ?? 10_000,
      ttlMs: options.ttlMs,
      now: options.now,
    });
  }

  add(key: string, value: T, options: MemoryStoreAddOptions = {}): Promise<void> {
    return this.mutex.run(() => {
      this.lru.set(key, value, options.ttlMs);
    });
  }

  get(key: string): Promise<T | undefined> {
    return this.mutex.run(() => this.lru.get(key));
  }

  search(query: string, limit: number, keyPrefix = ''): Promise<Array<MemorySearchHit<T>>> {
    return this.mutex.run(() => {
      const hits: Array<MemorySearchHit<T>> = [];
      for (const [key, value] of this.lru.values()) {
        if (!key.startsWith(keyPrefix)) continue;
        const score = keywordScore(query, stableStringify(value));
        if (score > 0) hits.push({ key, value, score });
      }
      // most recently used first among equal scores
      hits.reverse();
      return hits.sort((a, b) => b.score - a.score).slice(0, Math.max(0, limit));
    });
  }

  delete(key: string): Promise<boolean> {
    return this.mutex.run(() => this.lru.delete(key));
  }

  entries(prefix = ''): Promise<Array<[string, T]>> {
    return this.mutex.run(() => this.lru.values().filter(([key]) => key.startsWith(prefix)));
  }

  clear(): Promise<void> {
    return this.mutex.run(() => this.lru.clear());
  }

  get size(): number {
    return this.lru.size;
  }
}
