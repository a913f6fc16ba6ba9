/**
 * @fileoverview Remote store capability
 *
 * The only thing the Cache and Memory primitives know about an external
 * backend. Any client (SQLite, Redis, an HTTP service) can implement it;
 * the core never depends on a wire format.
 */

export interface RemoteSearchFilters {
  /** Only keys starting with this prefix. */
  keyPrefix?: string;
}

export interface RemoteSearchResult<T> {
  key: string;
  value: T;
  score: number;
}

export interface RemoteStore<T = unknown> {
  readonly name: string;
  add(key: string, value: T, ttlMs?: number): Promise<void>;
  /** Resolves undefined when the key is absent or expired. */
  get(key: string): Promise<T | undefined>;
  search(query: string, k: number, filters?: RemoteSearchFilters): Promise<Array<RemoteSearchResult<T>>>;
  delete(key: string): Promise<boolean>;
}
