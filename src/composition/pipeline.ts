/**
 * @fileoverview Fluent pipeline builder
 *
 * Reads left to right in the order the wrappers apply:
 *
 * ```typescript
 * const fetchUser = pipeline(lookup)
 *   .then(normalize)
 *   .withRetry({ maxRetries: 2 })
 *   .withTimeout({ timeoutMs: 500 })
 *   .withCache({ ttlMs: 60_000 })
 *   .build();
 * ```
 *
 * Each call returns a new builder; shared dependencies given to
 * `pipeline()` are handed to every primitive the builder creates.
 */

import type { Primitive, PrimitiveOptions } from '../core/primitive.js';
import { withCache, type CacheOptions } from '../performance/cache.js';
import { withCircuitBreaker, type CircuitBreakerOptions } from '../recovery/circuit_breaker.js';
import { withFallback } from '../recovery/fallback.js';
import { withRetry, type RetryOptions } from '../recovery/retry.js';
import { withTimeout, type TimeoutOptions } from '../recovery/timeout.js';
import { SequentialPrimitive } from './sequential.js';

export type SharedOptions = Omit<PrimitiveOptions, 'name'>;

export class PipelineBuilder<TIn, TOut> {
  constructor(
    private readonly current: Primitive<TIn, TOut>,
    private readonly shared: SharedOptions = {},
  ) {}

  then<TNext>(next: Primitive<TOut, TNext>): PipelineBuilder<TIn, TNext> {
    const chain = SequentialPrimitive.start(this.current, this.shared).then(next);
    return new PipelineBuilder(chain, this.shared);
  }

  withRetry(options: RetryOptions = {}): PipelineBuilder<TIn, TOut> {
    return this.wrap(withRetry(this.current, { ...this.shared, ...options }));
  }

  withTimeout(options: TimeoutOptions<TIn, TOut>): PipelineBuilder<TIn, TOut> {
    return this.wrap(withTimeout(this.current, { ...this.shared, ...options }));
  }

  withCache(options: CacheOptions<TIn, TOut> = {}): PipelineBuilder<TIn, TOut> {
    return this.wrap(withCache(this.current, { ...this.shared, ...options }));
  }

  withCircuitBreaker(options: CircuitBreakerOptions = {}): PipelineBuilder<TIn, TOut> {
    return this.wrap(withCircuitBreaker(this.current, { ...this.shared, ...options }));
  }

  withFallback(...alternatives: Primitive<TIn, TOut>[]): PipelineBuilder<TIn, TOut> {
    return this.wrap(withFallback(this.current, alternatives, this.shared));
  }

  build(): Primitive<TIn, TOut> {
    return this.current;
  }

  private wrap(next: Primitive<TIn, TOut>): PipelineBuilder<TIn, TOut> {
    return new PipelineBuilder(next, this.shared);
  }
}

export function pipeline<TIn, TOut>(first: Primitive<TIn, TOut>, shared: SharedOptions = {}): PipelineBuilder<TIn, TOut> {
  return new PipelineBuilder(first, shared);
}
