import Database from 'better-sqlite3';
import { afterEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { SqliteRemoteStore, openSqliteRemoteStore, openUntypedSqliteStore } from '../sqlite_remote_store.js';
import { StoreUnavailableError, ValidationError } from '../../core/errors.js';

const NoteSchema = z.object({ text: z.string() });

describe('SqliteRemoteStore', () => {
  const time = { now: 0 };
  const open: Array<{ close(): void }> = [];

  function notes(): SqliteRemoteStore<z.infer<typeof NoteSchema>> {
    const store = openSqliteRemoteStore(':memory:', { schema: NoteSchema, now: () => time.now });
    open.push(store);
    return store;
  }

  afterEach(() => {
    for (const store of open.splice(0)) {
      store.close();
    }
    time.now = 0;
  });

  it('stores and reads back validated values', async () => {
    const store = notes();
    await store.add('note:1', { text: 'hello' });
    expect(await store.get('note:1')).toEqual({ text: 'hello' });
    expect(await store.get('note:2')).toBeUndefined();
    expect(store.name).toBe('sqlite:loomwork_store');
  });

  it('overwrites an existing key', async () => {
    const store = notes();
    await store.add('k', { text: 'first' });
    await store.add('k', { text: 'second' });
    expect(await store.get('k')).toEqual({ text: 'second' });
  });

  it('treats entries past their ttl as absent', async () => {
    const store = notes();
    await store.add('short', { text: 'soon gone' }, 100);
    await store.add('other', { text: 'also short' }, 100);
    await store.add('long', { text: 'kept' });
    time.now = 99;
    expect(await store.get('short')).toEqual({ text: 'soon gone' });
    time.now = 100;
    expect(await store.get('short')).toBeUndefined();
    expect(store.purgeExpired()).toBe(1);
    expect(await store.get('long')).toEqual({ text: 'kept' });
  });

  it('searches live values by keyword within a key prefix', async () => {
    const store = notes();
    await store.add('mem:a', { text: 'alpha beta' });
    await store.add('mem:b', { text: 'beta gamma' });
    await store.add('other:c', { text: 'beta gamma' });

    const results = await store.search('beta gamma', 10, { keyPrefix: 'mem:' });
    expect(results).toEqual([
      { key: 'mem:b', value: { text: 'beta gamma' }, score: 1 },
      { key: 'mem:a', value: { text: 'alpha beta' }, score: 0.5 },
    ]);
    expect(await store.search('beta', 1)).toHaveLength(1);
    expect(await store.search('delta', 10)).toEqual([]);
  });

  it('matches key prefixes literally', async () => {
    const store = notes();
    await store.add('a_1', { text: 'underscore' });
    await store.add('ab2', { text: 'letter' });
    const results = await store.search('', 10, { keyPrefix: 'a_' });
    expect(results.map((r) => r.key)).toEqual(['a_1']);
  });

  it('reports whether a delete removed anything', async () => {
    const store = notes();
    await store.add('k', { text: 'x' });
    expect(await store.delete('k')).toBe(true);
    expect(await store.delete('k')).toBe(false);
  });

  it('rejects stored values that do not match the schema', async () => {
    const db = new Database(':memory:');
    const strings = new SqliteRemoteStore(db, { schema: z.string(), table: 'shared' });
    const numbers = new SqliteRemoteStore(db, { schema: z.number(), table: 'shared' });
    await strings.add('k', 'text');
    await expect(numbers.get('k')).rejects.toThrow(
      'Validation failed for k: expected a value matching the store schema, got Expected number, received string',
    );
    db.close();
  });

  it('rejects values JSON cannot represent', async () => {
    const store = openUntypedSqliteStore(':memory:');
    open.push(store);
    await expect(store.add('k', undefined)).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects table names that are not identifiers', () => {
    const db = new Database(':memory:');
    expect(() => new SqliteRemoteStore(db, { schema: z.string(), table: 'x; DROP TABLE y' })).toThrow(ValidationError);
    db.close();
  });

  it('wraps driver failures in StoreUnavailableError', async () => {
    const store = openSqliteRemoteStore(':memory:', { schema: NoteSchema, name: 'notes-db' });
    store.close();
    const failure = await store.get('k').catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(StoreUnavailableError);
    expect(failure instanceof StoreUnavailableError ? failure.operation : undefined).toBe('get');
  });
});
