/**
 * @fileoverview Local-first store with an optional remote mirror
 *
 * The in-process store is authoritative: every write lands there first and
 * every read is answered from it when it can be. The remote tier is
 * written through and consulted on a local miss (the value is then
 * promoted into the local store). Remote failures are logged as
 * StoreUnavailableError and the store keeps working locally.
 */

import { StoreUnavailableError, type StoreOperation } from '../core/errors.js';
import type { RemoteStore } from '../storage/types.js';
import { defaultLogger, type Logger } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { InMemoryStore, type InMemoryStoreOptions } from './in_memory_store.js';
import type { BackendInfo, MemorySearchHit, MemoryStore, MemoryStoreAddOptions } from './types.js';

export interface HybridMemoryStoreOptions<T> extends InMemoryStoreOptions {
  remote?: RemoteStore<T>;
  logger?: Logger;
}

export class HybridMemoryStore<T> implements MemoryStore<T> {
  private readonly local: InMemoryStore<T>;
  private readonly remote?: RemoteStore<T>;
  private readonly logger: Logger;
  private remoteHealthy = true;

  constructor(options: HybridMemoryStoreOptions<T> = {}) {
    this.local = new InMemoryStore<T>(options);
    this.remote = options.remote;
    this.logger = options.logger ?? defaultLogger;
  }

  async add(key: string, value: T, options: MemoryStoreAddOptions = {}): Promise<void> {
    await this.local.add(key, value, options);
    await this.tryRemote('add', (remote) => remote.add(key, value, options.ttlMs));
  }

  async get(key: string): Promise<T | undefined> {
    const local = await this.local.get(key);
    if (local !== undefined) {
      return local;
    }
    const remoteValue = await this.tryRemote('get', (remote) => remote.get(key));
    if (remoteValue !== undefined) {
      await this.local.add(key, remoteValue);
    }
    return remoteValue;
  }

  /** Local hits first; remote hits fill the remaining slots. */
  async search(query: string, limit: number, keyPrefix = ''): Promise<Array<MemorySearchHit<T>>> {
    const hits = await this.local.search(query, limit, keyPrefix);
    if (hits.length >= limit) {
      return hits;
    }
    const remoteHits = await this.tryRemote('search', (remote) => remote.search(query, limit, { keyPrefix }));
    if (!remoteHits) {
      return hits;
    }
    const seen = new Set(hits.map((hit) => hit.key));
    for (const hit of remoteHits) {
      if (hits.length >= limit) break;
      if (seen.has(hit.key)) continue;
      seen.add(hit.key);
      hits.push(hit);
    }
    return hits;
  }

  async delete(key: string): Promise<boolean> {
    const removedLocally = await this.local.delete(key);
    const removedRemotely = await this.tryRemote('delete', (remote) => remote.delete(key));
    return removedLocally || removedRemotely === true;
  }

  /** Local entries only; the remote tier has no enumeration contract. */
  entries(prefix = ''): Promise<Array<[string, T]>> {
    return this.local.entries(prefix);
  }

  getBackendInfo(): BackendInfo {
    return {
      local: this.local.kind,
      remote: this.remote?.name ?? null,
      remoteHealthy: this.remote ? this.remoteHealthy : false,
      localEntries: this.local.size,
    };
  }

  private async tryRemote<R>(operation: StoreOperation, call: (remote: RemoteStore<T>) => Promise<R>): Promise<R | undefined> {
    if (!this.remote) {
      return undefined;
    }
    try {
      const result = await call(this.remote);
      this.remoteHealthy = true;
      return result;
    } catch (error) {
      this.remoteHealthy = false;
      const unavailable = new StoreUnavailableError(this.remote.name, operation, getErrorMessage(error), toError(error));
      this.logger.warn(`${unavailable.message}; using local memory only`, { code: unavailable.code });
      return undefined;
    }
  }
}
