/**
 * @fileoverview Cache decorator
 *
 * Memoises the wrapped primitive by a key derived from `(input, ctx)`.
 * Hits return the stored value and mark the entry most recently used;
 * misses run the primitive and store its result, evicting the least
 * recently used entry on overflow. Entries past their TTL read as misses.
 *
 * A per-instance mutex makes lookup/touch and store/evict atomic with
 * respect to each other. Concurrent identical misses share one upstream
 * call (single-flight) unless `singleFlight: false`; each caller still
 * waits under its own signal and receives its own cancellation.
 *
 * An optional RemoteStore is consulted after a local miss and written after
 * an upstream call. The remote is an enhancement only: any failure is
 * logged and the cache carries on with its local store.
 */

import type { WorkflowContext } from '../core/context.js';
import { ConfigurationError, StoreUnavailableError, type StoreOperation } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { countMetric } from '../observability/instrumentation.js';
import { METRIC_CACHE_LOOKUPS } from '../observability/sink.js';
import type { RemoteStore } from '../storage/types.js';
import { abortable, createMutex } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { computeContentHash } from '../utils/hashing.js';
import { LruStore } from './lru_store.js';

export type CacheKeyFn<TIn> = (input: TIn, ctx: WorkflowContext) => string;

export interface CacheOptions<TIn, TOut> extends PrimitiveOptions {
  /** Entry lifetime. Default: 300000 (5 minutes) */
  ttlMs?: number;
  /** Maximum number of entries. Default: 1000 */
  maxSize?: number;
  /** Default: SHA-256 of the stable serialisation of the input */
  keyFn?: CacheKeyFn<TIn>;
  /** Share one upstream call between concurrent identical misses. Default: true */
  singleFlight?: boolean;
  remote?: RemoteStore<TOut>;
}

export interface CacheStats {
  hits: number;
  misses: number;
  remoteHits: number;
  evictions: number;
  expirations: number;
  size: number;
  maxSize: number;
  /** hits / (hits + misses); 0 before the first lookup */
  hitRate: number;
}

interface Flight<T> {
  readonly key: string;
  readonly promise: Promise<T>;
  readonly controller: AbortController;
  waiters: number;
}

export const DEFAULT_CACHE = {
  ttlMs: 300_000,
  maxSize: 1000,
  singleFlight: true,
} as const;

export function defaultCacheKey(input: unknown): string {
  return computeContentHash(input);
}

export class CachePrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'cache';
  readonly ttlMs: number;
  readonly singleFlight: boolean;
  private readonly store: LruStore<TOut>;
  private readonly keyFn: CacheKeyFn<TIn>;
  private readonly remote?: RemoteStore<TOut>;
  private readonly mutex = createMutex();
  private readonly inFlight = new Map<string, Flight<TOut>>();
  private hits = 0;
  private misses = 0;
  private remoteHits = 0;

  constructor(
    private readonly inner: Primitive<TIn, TOut>,
    options: CacheOptions<TIn, TOut> = {},
  ) {
    const ttlMs = options.ttlMs ?? DEFAULT_CACHE.ttlMs;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new ConfigurationError(`Cache ttlMs must be positive, got ${ttlMs}`);
    }
    super(`Cache(${inner.name})`, options);
    this.ttlMs = ttlMs;
    this.singleFlight = options.singleFlight ?? DEFAULT_CACHE.singleFlight;
    this.keyFn = options.keyFn ?? ((input) => defaultCacheKey(input));
    this.remote = options.remote;
    this.store = new LruStore<TOut>({
      maxSize: options.maxSize ?? DEFAULT_CACHE.maxSize,
      ttlMs,
      now: () => this.clock.now(),
    });
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    const key = this.keyFn(input, ctx);

    const cached = await this.mutex.run(() => this.store.touch(key));
    if (cached) {
      this.hits += 1;
      this.count('hit');
      return cached.value;
    }

    if (!this.singleFlight) {
      this.misses += 1;
      this.count('miss');
      return this.load(key, input, ctx);
    }

    let flight = this.inFlight.get(key);
    if (flight) {
      this.count('shared');
    } else {
      this.misses += 1;
      this.count('miss');
      flight = this.startFlight(key, input, ctx);
    }
    return this.join(flight, ctx);
  }

  /**
   * The shared load runs under its own signal, so one caller's cancellation
   * never reaches the others. It is aborted only once every caller waiting
   * on it has given up.
   */
  private startFlight(key: string, input: TIn, ctx: WorkflowContext): Flight<TOut> {
    const controller = new AbortController();
    const flight: Flight<TOut> = {
      key,
      promise: this.load(key, input, ctx.withSignal(controller.signal)),
      controller,
      waiters: 0,
    };
    this.inFlight.set(key, flight);
    const settle = (): void => {
      if (this.inFlight.get(key) === flight) {
        this.inFlight.delete(key);
      }
    };
    void flight.promise.then(settle, settle);
    return flight;
  }

  private async join(flight: Flight<TOut>, ctx: WorkflowContext): Promise<TOut> {
    flight.waiters += 1;
    try {
      return await abortable(flight.promise, ctx.signal, this.name);
    } catch (error) {
      if (ctx.signal?.aborted && flight.waiters === 1) {
        // Last waiter gone: a later caller starts a fresh load instead of joining this one.
        if (this.inFlight.get(flight.key) === flight) {
          this.inFlight.delete(flight.key);
        }
        flight.controller.abort(ctx.signal.reason);
      }
      throw error;
    } finally {
      flight.waiters -= 1;
    }
  }

  private async load(key: string, input: TIn, ctx: WorkflowContext): Promise<TOut> {
    if (this.remote) {
      const remoteValue = await this.tryRemote('get', () => this.remote?.get(key));
      if (remoteValue !== undefined) {
        this.remoteHits += 1;
        this.count('remote_hit');
        await this.mutex.run(() => this.store.set(key, remoteValue, this.ttlMs));
        return remoteValue;
      }
    }

    const value = await this.inner.execute(input, ctx);
    const evicted = await this.mutex.run(() => this.store.set(key, value, this.ttlMs));
    if (evicted.length > 0) {
      this.logger.debug(`Cache ${this.name} evicted ${evicted.length} entr${evicted.length === 1 ? 'y' : 'ies'}`);
    }
    if (this.remote) {
      await this.tryRemote('add', () => this.remote?.add(key, value, this.ttlMs));
    }
    return value;
  }

  /** Remote failures degrade to local behaviour. */
  private async tryRemote<R>(operation: StoreOperation, call: () => Promise<R> | undefined): Promise<R | undefined> {
    try {
      return await call();
    } catch (error) {
      const unavailable = new StoreUnavailableError(
        this.remote?.name ?? 'remote',
        operation,
        getErrorMessage(error),
        toError(error),
      );
      this.logger.warn(`Cache ${this.name}: ${unavailable.message}; continuing with local store`, {
        code: unavailable.code,
      });
      return undefined;
    }
  }

  private count(result: 'hit' | 'miss' | 'shared' | 'remote_hit'): void {
    countMetric(this.instrumentation, METRIC_CACHE_LOOKUPS, { primitive: this.name, result });
  }

  /** Drop one key locally and, when configured, remotely. */
  async invalidate(key: string): Promise<boolean> {
    const removed = await this.mutex.run(() => this.store.delete(key));
    if (this.remote) {
      await this.tryRemote('delete', () => this.remote?.delete(key));
    }
    return removed;
  }

  /** Drop every local entry and reset the hit and miss counters. */
  async clear(): Promise<void> {
    await this.mutex.run(() => this.store.clear());
    this.hits = 0;
    this.misses = 0;
    this.remoteHits = 0;
  }

  keyFor(input: TIn, ctx: WorkflowContext): string {
    return this.keyFn(input, ctx);
  }

  stats(): CacheStats {
    const lru = this.store.stats();
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      remoteHits: this.remoteHits,
      evictions: lru.evictions,
      expirations: lru.expirations,
      size: lru.size,
      maxSize: lru.maxSize,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }
}

export function withCache<TIn, TOut>(
  primitive: Primitive<TIn, TOut>,
  options: CacheOptions<TIn, TOut> = {},
): CachePrimitive<TIn, TOut> {
  return new CachePrimitive(primitive, options);
}
