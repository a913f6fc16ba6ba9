/**
 * @fileoverview SQLite-backed RemoteStore
 *
 * Reference enhancement backend for the Cache and Memory primitives. Values
 * are stored as JSON and validated with a zod schema on the way out, so a
 * typed store never hands back something of the wrong shape.
 *
 * Works on a file database or `:memory:`.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { StoreUnavailableError, ValidationError, type StoreOperation } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type { RemoteSearchFilters, RemoteSearchResult, RemoteStore } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SqliteRemoteStoreOptions<T> {
  /** Validates values read back from the database. */
  schema: z.ZodType<T>;
  /** Table name. Default: loomwork_store */
  table?: string;
  name?: string;
  now?: () => number;
}

interface StoreRow {
  key: string;
  value: string;
  expires_at: number | null;
}

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

// ============================================================================
// STORE
// ============================================================================

export class SqliteRemoteStore<T> implements RemoteStore<T> {
  readonly name: string;
  private readonly db: Database.Database;
  private readonly schema: z.ZodType<T>;
  private readonly now: () => number;

  private readonly stmtUpsert: Database.Statement<[string, string, number | null, number]>;
  private readonly stmtGet: Database.Statement<[string], StoreRow>;
  private readonly stmtDelete: Database.Statement<[string]>;
  private readonly stmtSearch: Database.Statement<[number, string], StoreRow>;
  private readonly stmtPurge: Database.Statement<[number]>;

  constructor(db: Database.Database, options: SqliteRemoteStoreOptions<T>) {
    const table = options.table ?? 'loomwork_store';
    if (!TABLE_NAME.test(table)) {
      throw new ValidationError('table', 'an SQL identifier', table);
    }
    this.db = db;
    this.schema = options.schema;
    this.name = options.name ?? `sqlite:${table}`;
    this.now = options.now ?? Date.now;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${table} (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        expires_at INTEGER,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_${table}_updated_at ON ${table}(updated_at);
    `);

    this.stmtUpsert = this.db.prepare<[string, string, number | null, number]>(`
      INSERT INTO ${table} (key, value, expires_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        expires_at = excluded.expires_at,
        updated_at = excluded.updated_at
    `);
    this.stmtGet = this.db.prepare<[string], StoreRow>(`SELECT key, value, expires_at FROM ${table} WHERE key = ?`);
    this.stmtDelete = this.db.prepare<[string]>(`DELETE FROM ${table} WHERE key = ?`);
    this.stmtSearch = this.db.prepare<[number, string], StoreRow>(`
      SELECT key, value, expires_at FROM ${table}
      WHERE (expires_at IS NULL OR expires_at > ?) AND key LIKE ? ESCAPE '\\'
      ORDER BY updated_at DESC
    `);
    this.stmtPurge = this.db.prepare<[number]>(`DELETE FROM ${table} WHERE expires_at IS NOT NULL AND expires_at <= ?`);
  }

  async add(key: string, value: T, ttlMs?: number): Promise<void> {
    const now = this.now();
    const encoded = JSON.stringify(value);
    if (encoded === undefined) {
      throw new ValidationError(key, 'a JSON-serialisable value', typeof value);
    }
    this.guard('add', () => {
      this.stmtUpsert.run(key, encoded, ttlMs !== undefined && ttlMs > 0 ? now + ttlMs : null, now);
    });
  }

  async get(key: string): Promise<T | undefined> {
    const row = this.guard('get', () => this.stmtGet.get(key));
    if (!row) return undefined;
    if (row.expires_at !== null && row.expires_at <= this.now()) {
      this.guard('delete', () => this.stmtDelete.run(key));
      return undefined;
    }
    return this.decode(row);
  }

  /**
   * Keyword search over the JSON text of live values. Score is the fraction
   * of query terms present; ties keep most-recently-updated first.
   */
  async search(query: string, k: number, filters: RemoteSearchFilters = {}): Promise<Array<RemoteSearchResult<T>>> {
    const terms = tokenize(query);
    const prefix = `${escapeLike(filters.keyPrefix ?? '')}%`;
    const rows = this.guard('search', () => this.stmtSearch.all(this.now(), prefix));

    const results: Array<RemoteSearchResult<T>> = [];
    for (const row of rows) {
      const haystack = new Set(tokenize(row.value));
      const matched = terms.filter((term) => haystack.has(term)).length;
      const score = terms.length === 0 ? 1 : matched / terms.length;
      if (score > 0) {
        results.push({ key: row.key, value: this.decode(row), score });
      }
    }
    return results.sort((a, b) => b.score - a.score).slice(0, Math.max(0, k));
  }

  async delete(key: string): Promise<boolean> {
    return this.guard('delete', () => this.stmtDelete.run(key).changes > 0);
  }

  /** Physically remove expired rows; returns how many went. */
  purgeExpired(): number {
    return this.guard('delete', () => this.stmtPurge.run(this.now()).changes);
  }

  close(): void {
    this.db.close();
  }

  private decode(row: StoreRow): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(row.value);
    } catch (error) {
      throw new ValidationError(row.key, 'valid JSON', getErrorMessage(error));
    }
    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      throw new ValidationError(row.key, 'a value matching the store schema', result.error.errors[0]?.message ?? 'invalid');
    }
    return result.data;
  }

  private guard<R>(operation: StoreOperation, fn: () => R): R {
    try {
      return fn();
    } catch (error) {
      throw new StoreUnavailableError(this.name, operation, getErrorMessage(error), toError(error));
    }
  }
}

/**
 * Open (or create) a database file, or pass `:memory:` for a private
 * in-process database.
 */
export function openSqliteRemoteStore<T>(
  filename: string,
  options: SqliteRemoteStoreOptions<T>,
): SqliteRemoteStore<T> {
  return new SqliteRemoteStore(new Database(filename), options);
}

/** A store that accepts any JSON value. */
export function openUntypedSqliteStore(filename: string): SqliteRemoteStore<unknown> {
  return openSqliteRemoteStore(filename, { schema: z.unknown() });
}
