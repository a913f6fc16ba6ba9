import { describe, expect, it, vi } from 'vitest';
import { HybridMemoryStore } from '../hybrid_store.js';
import { InMemoryStore, keywordScore, tokenize } from '../in_memory_store.js';
import type { RemoteSearchResult, RemoteStore } from '../../storage/types.js';
import { silentLogger, type Logger } from '../../telemetry/logger.js';

class FakeRemote implements RemoteStore<string> {
  readonly entries = new Map<string, string>();
  failing = false;

  constructor(readonly name: string) {}

  async add(key: string, value: string): Promise<void> {
    this.check();
    this.entries.set(key, value);
  }

  async get(key: string): Promise<string | undefined> {
    this.check();
    return this.entries.get(key);
  }

  async search(): Promise<Array<RemoteSearchResult<string>>> {
    this.check();
    return [...this.entries].map(([key, value]) => ({ key, value, score: 1 }));
  }

  async delete(key: string): Promise<boolean> {
    this.check();
    return this.entries.delete(key);
  }

  private check(): void {
    if (this.failing) {
      throw new Error('boom');
    }
  }
}

describe('keyword helpers', () => {
  it('tokenizes on anything but letters and digits', () => {
    expect(tokenize('Retry-after: 30s, Überprüfung')).toEqual(['retry', 'after', '30s', 'überprüfung']);
  });

  it('scores the fraction of query terms present', () => {
    expect(keywordScore('alpha gamma', 'alpha beta')).toBe(0.5);
    expect(keywordScore('', 'anything')).toBe(1);
    expect(keywordScore('delta', 'alpha beta')).toBe(0);
  });
});

describe('InMemoryStore', () => {
  it('adds, reads and deletes values', async () => {
    const store = new InMemoryStore<string>();
    await store.add('k', 'v');
    expect(await store.get('k')).toBe('v');
    expect(await store.delete('k')).toBe(true);
    expect(await store.get('k')).toBeUndefined();
  });

  it('expires entries added with a ttl', async () => {
    let now = 0;
    const store = new InMemoryStore<string>({ now: () => now });
    await store.add('short', 'gone soon', { ttlMs: 10 });
    await store.add('long', 'stays');
    now = 10;
    expect(await store.get('short')).toBeUndefined();
    expect(await store.get('long')).toBe('stays');
  });

  it('ranks search hits by score, most recent first on ties', async () => {
    const store = new InMemoryStore<string>();
    await store.add('a', 'alpha beta');
    await store.add('b', 'beta gamma');
    await store.add('c', 'delta');
    await store.add('d', 'alpha beta gamma');

    const hits = await store.search('beta gamma', 10);
    expect(hits.map((hit) => [hit.key, hit.score])).toEqual([
      ['d', 1],
      ['b', 1],
      ['a', 0.5],
    ]);
    expect((await store.search('beta', 1)).map((hit) => hit.key)).toEqual(['d']);
  });

  it('filters entries and search hits by key prefix', async () => {
    const store = new InMemoryStore<string>();
    await store.add('x:1', 'one');
    await store.add('y:1', 'one');
    expect(await store.entries('x:')).toEqual([['x:1', 'one']]);
    expect((await store.search('one', 10, 'y:')).map((hit) => hit.key)).toEqual(['y:1']);
  });

  it('stays within maxEntries', async () => {
    const store = new InMemoryStore<number>({ maxEntries: 2 });
    await store.add('a', 1);
    await store.add('b', 2);
    await store.add('c', 3);
    expect(store.size).toBe(2);
    expect(await store.get('a')).toBeUndefined();
  });
});

describe('HybridMemoryStore', () => {
  it('works locally without a remote', async () => {
    const store = new HybridMemoryStore<string>();
    await store.add('k', 'v');
    expect(await store.get('k')).toBe('v');
    expect(store.getBackendInfo()).toEqual({ local: 'in-memory', remote: null, remoteHealthy: false, localEntries: 1 });
  });

  it('writes through to the remote', async () => {
    const remote = new FakeRemote('fake');
    const store = new HybridMemoryStore<string>({ remote, logger: silentLogger });
    await store.add('k', 'v');
    expect(remote.entries.get('k')).toBe('v');
    expect(store.getBackendInfo()).toEqual({ local: 'in-memory', remote: 'fake', remoteHealthy: true, localEntries: 1 });
  });

  it('promotes remote values on a local miss', async () => {
    const remote = new FakeRemote('fake');
    remote.entries.set('k', 'from remote');
    const store = new HybridMemoryStore<string>({ remote, logger: silentLogger });

    expect(await store.get('k')).toBe('from remote');
    remote.entries.clear();
    expect(await store.get('k')).toBe('from remote');
  });

  it('fills search results from the remote after local hits', async () => {
    const remote = new FakeRemote('fake');
    const store = new HybridMemoryStore<string>({ remote, logger: silentLogger });
    await store.add('a', 'x y');
    remote.entries.set('b', 'x z');

    const hits = await store.search('x', 5);
    expect(hits.map((hit) => hit.key)).toEqual(['a', 'b']);
  });

  it('degrades to local memory when the remote fails', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
    const remote = new FakeRemote('flaky');
    remote.failing = true;
    const store = new HybridMemoryStore<string>({ remote, logger });

    await store.add('k', 'v');
    expect(await store.get('k')).toBe('v');
    expect(await store.delete('k')).toBe(true);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'Store flaky unavailable during add: boom; using local memory only', {
      code: 'STORE_UNAVAILABLE',
    });
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(store.getBackendInfo().remoteHealthy).toBe(false);

    remote.failing = false;
    await store.add('k2', 'v2');
    expect(store.getBackendInfo().remoteHealthy).toBe(true);
  });
});
