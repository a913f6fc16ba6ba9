/**
 * @fileoverview Runtime
 *
 * Binds one resolved configuration, logger, sink and clock to the primitive
 * factories. Anything built through a runtime shares those dependencies and
 * starts from the configured defaults; per-call options still win.
 *
 * @example
 * ```typescript
 * const runtime = createRuntime({ retry: { maxRetries: 2 } });
 * const lookup = runtime.retry(runtime.timeout(fetchProfile));
 * await lookup.execute('user-7', runtime.context({ sessionId: 's-1' }));
 * ```
 */

import { ConditionalPrimitive, type Predicate } from './composition/conditional.js';
import {
  parallel,
  type ParallelOptions,
  type ParallelPrimitive,
  type ParallelSettledPrimitive,
} from './composition/parallel.js';
import { pipeline, type PipelineBuilder } from './composition/pipeline.js';
import { router, type RouterOptions, type RouterPrimitive } from './composition/router.js';
import { SequentialPrimitive } from './composition/sequential.js';
import { resolveRuntimeConfig, type RuntimeConfig, type RuntimeConfigInput } from './config/runtime_config.js';
import { systemClock, type Clock } from './core/clock.js';
import { createContext, type WorkflowContext, type WorkflowContextInit } from './core/context.js';
import { fromFunction, type FunctionPrimitive, type Primitive, type PrimitiveFn } from './core/primitive.js';
import { MemoryPrimitive, type MemoryPrimitiveOptions } from './memory/memory_primitive.js';
import { NOOP_SINK, type ObservabilitySink } from './observability/sink.js';
import { CachePrimitive, type CacheOptions } from './performance/cache.js';
import { CircuitBreakerPrimitive, type CircuitBreakerOptions } from './recovery/circuit_breaker.js';
import { FallbackPrimitive } from './recovery/fallback.js';
import { RetryPrimitive, type RetryOptions } from './recovery/retry.js';
import { TimeoutPrimitive, type TimeoutOptions } from './recovery/timeout.js';
import { createConsoleLogger, type Logger } from './telemetry/logger.js';

export interface RuntimeDependencies {
  logger?: Logger;
  sink?: ObservabilitySink;
  clock?: Clock;
}

export interface Runtime {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly sink: ObservabilitySink;
  readonly clock: Clock;
  context(init?: Omit<WorkflowContextInit, 'now'>): WorkflowContext;
  fn<TIn, TOut>(name: string, fn: PrimitiveFn<TIn, TOut>): FunctionPrimitive<TIn, TOut>;
  sequence<TIn, TOut>(first: Primitive<TIn, TOut>): SequentialPrimitive<TIn, TOut>;
  parallel<TIn, TOut>(
    branches: readonly Primitive<TIn, TOut>[],
    options: ParallelOptions & { failFast: false },
  ): ParallelSettledPrimitive<TIn, TOut>;
  parallel<TIn, TOut>(
    branches: readonly Primitive<TIn, TOut>[],
    options?: ParallelOptions & { failFast?: true },
  ): ParallelPrimitive<TIn, TOut>;
  router<TIn, TOut>(options: RouterOptions<TIn, TOut>): RouterPrimitive<TIn, TOut>;
  when<TIn, TOut>(
    predicate: Predicate<TIn>,
    ifTrue: Primitive<TIn, TOut>,
    ifFalse: Primitive<TIn, TOut>,
  ): ConditionalPrimitive<TIn, TOut>;
  pipeline<TIn, TOut>(first: Primitive<TIn, TOut>): PipelineBuilder<TIn, TOut>;
  retry<TIn, TOut>(primitive: Primitive<TIn, TOut>, options?: RetryOptions): RetryPrimitive<TIn, TOut>;
  timeout<TIn, TOut>(
    primitive: Primitive<TIn, TOut>,
    options?: Partial<TimeoutOptions<TIn, TOut>>,
  ): TimeoutPrimitive<TIn, TOut>;
  fallback<TIn, TOut>(
    primary: Primitive<TIn, TOut>,
    ...alternatives: Primitive<TIn, TOut>[]
  ): FallbackPrimitive<TIn, TOut>;
  cache<TIn, TOut>(primitive: Primitive<TIn, TOut>, options?: CacheOptions<TIn, TOut>): CachePrimitive<TIn, TOut>;
  circuitBreaker<TIn, TOut>(
    primitive: Primitive<TIn, TOut>,
    options?: CircuitBreakerOptions,
  ): CircuitBreakerPrimitive<TIn, TOut>;
  memory(options?: MemoryPrimitiveOptions): MemoryPrimitive;
}

/**
 * Build a runtime from configuration input. The input is the highest
 * precedence layer over LOOMWORK_* variables and the defaults; pass an
 * already-resolved config (e.g. from loadRuntimeConfigFile) to use it as is.
 */
export function createRuntime(
  config: RuntimeConfigInput = {},
  dependencies: RuntimeDependencies = {},
): Runtime {
  const resolved = resolveRuntimeConfig({ overrides: config });
  const logger = dependencies.logger ?? createConsoleLogger({ level: resolved.logLevel, prefix: 'loomwork' });
  const sink = dependencies.sink ?? NOOP_SINK;
  const clock = dependencies.clock ?? systemClock;
  const shared = { logger, sink, clock };

  function fanOut<TIn, TOut>(
    branches: readonly Primitive<TIn, TOut>[],
    options: ParallelOptions & { failFast: false },
  ): ParallelSettledPrimitive<TIn, TOut>;
  function fanOut<TIn, TOut>(
    branches: readonly Primitive<TIn, TOut>[],
    options?: ParallelOptions & { failFast?: true },
  ): ParallelPrimitive<TIn, TOut>;
  function fanOut<TIn, TOut>(
    branches: readonly Primitive<TIn, TOut>[],
    options: ParallelOptions = {},
  ): ParallelPrimitive<TIn, TOut> | ParallelSettledPrimitive<TIn, TOut> {
    return options.failFast === false
      ? parallel(branches, { ...shared, ...options, failFast: false })
      : parallel(branches, { ...shared, ...options, failFast: true });
  }

  return {
    config: resolved,
    logger,
    sink,
    clock,
    context: (init = {}) => createContext({ ...init, now: () => clock.now() }),
    fn: (name, fn) => fromFunction(name, fn, shared),
    sequence: (first) => SequentialPrimitive.start(first, shared),
    parallel: fanOut,
    router: (options) => router({ ...shared, ...options }),
    when: (predicate, ifTrue, ifFalse) => new ConditionalPrimitive({ ...shared, predicate, ifTrue, ifFalse }),
    pipeline: (first) => pipeline(first, shared),
    retry: (primitive, options = {}) => new RetryPrimitive(primitive, { ...shared, ...resolved.retry, ...options }),
    timeout: (primitive, options = {}) =>
      new TimeoutPrimitive(primitive, { ...shared, timeoutMs: resolved.timeout.timeoutMs, ...options }),
    fallback: (primary, ...alternatives) => new FallbackPrimitive(primary, alternatives, shared),
    cache: (primitive, options = {}) => new CachePrimitive(primitive, { ...shared, ...resolved.cache, ...options }),
    circuitBreaker: (primitive, options = {}) =>
      new CircuitBreakerPrimitive(primitive, { ...shared, ...resolved.circuitBreaker, ...options }),
    memory: (options = {}) => new MemoryPrimitive({ ...shared, ...resolved.memory, ...options }),
  };
}
