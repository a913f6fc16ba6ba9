/**
 * @fileoverview Bounded LRU map with lazy per-entry TTL
 *
 * Map insertion order doubles as recency order: a touched entry is deleted
 * and re-inserted at the tail, so the head is always the least recently
 * used. Expired entries are dropped when read, not by a timer.
 */

import { ConfigurationError } from '../core/errors.js';

export interface LruEntry<T> {
  value: T;
  insertedAt: number;
  lastAccessedAt: number;
  /** null: never expires */
  ttlMs: number | null;
}

export interface LruStats {
  size: number;
  maxSize: number;
  evictions: number;
  expirations: number;
}

export interface LruStoreOptions {
  maxSize: number;
  /** Default TTL for entries set without one. */
  ttlMs?: number;
  now?: () => number;
  /** Called for each entry evicted to make room. */
  onEvict?: (key: string) => void;
}

export class LruStore<T> {
  private readonly entries = new Map<string, LruEntry<T>>();
  readonly maxSize: number;
  private readonly ttlMs: number | null;
  private readonly now: () => number;
  private readonly onEvict?: (key: string) => void;
  private evictions = 0;
  private expirations = 0;

  constructor(options: LruStoreOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
      throw new ConfigurationError(`LRU store maxSize must be a positive integer, got ${options.maxSize}`);
    }
    if (options.ttlMs !== undefined && (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0)) {
      throw new ConfigurationError(`LRU store ttlMs must be positive, got ${options.ttlMs}`);
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs ?? null;
    this.now = options.now ?? Date.now;
    this.onEvict = options.onEvict;
  }

  /** Read and mark as most recently used. */
  get(key: string): T | undefined {
    return this.touch(key)?.value;
  }

  /**
   * Like `get`, but returns the entry so a stored `undefined` can be told
   * apart from a miss.
   */
  touch(key: string): LruEntry<T> | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    const touched = { ...entry, lastAccessedAt: this.now() };
    this.entries.delete(key);
    this.entries.set(key, touched);
    return { ...touched };
  }

  /** Read without touching recency. */
  peek(key: string): T | undefined {
    return this.live(key)?.value;
  }

  entry(key: string): LruEntry<T> | undefined {
    const entry = this.live(key);
    return entry ? { ...entry } : undefined;
  }

  has(key: string): boolean {
    return this.live(key) !== undefined;
  }

  /** Insert or replace; returns the keys evicted to stay within maxSize. */
  set(key: string, value: T, ttlMs?: number): string[] {
    const now = this.now();
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    this.entries.set(key, { value, insertedAt: now, lastAccessedAt: now, ttlMs: ttlMs ?? this.ttlMs });
    return this.evictIfNeeded();
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /** Live entries from least to most recently used. Expired ones are dropped. */
  values(): Array<[string, T]> {
    const result: Array<[string, T]> = [];
    for (const key of Array.from(this.entries.keys())) {
      const entry = this.live(key);
      if (entry) result.push([key, entry.value]);
    }
    return result;
  }

  stats(): LruStats {
    return { size: this.entries.size, maxSize: this.maxSize, evictions: this.evictions, expirations: this.expirations };
  }

  private live(key: string): LruEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.expirations += 1;
      return undefined;
    }
    return entry;
  }

  private evictIfNeeded(): string[] {
    const evicted: string[] = [];
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions += 1;
      evicted.push(oldest.value);
      this.onEvict?.(oldest.value);
    }
    return evicted;
  }

  private isExpired(entry: LruEntry<T>): boolean {
    if (entry.ttlMs === null) return false;
    return this.now() - entry.insertedAt >= entry.ttlMs;
  }
}
