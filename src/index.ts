/**
 * @fileoverview loomwork - composable workflow primitives
 *
 * Every unit of work is a `Primitive<TIn, TOut>`. Primitives compose into
 * sequences, parallel fan-outs and routers, and are wrapped by recovery and
 * performance decorators (retry, timeout, fallback, circuit breaker,
 * compensation, cache). A four-layer memory primitive and a fact registry
 * sit alongside.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createRuntime, fromFunction, sequenceOf } from 'loomwork';
 *
 * const runtime = createRuntime({ retry: { maxRetries: 2 } });
 * const parse = fromFunction('parse', (text: string) => Number.parseInt(text, 10));
 * const double = fromFunction('double', (n: number) => n * 2);
 *
 * const workflow = runtime.retry(sequenceOf(parse, double));
 * await workflow.execute('21', runtime.context()); // 42
 * ```
 */

// Core
export * from './core/errors.js';
export * from './core/result.js';
export * from './core/clock.js';
export { WorkflowContext, createContext, generateSpanId } from './core/context.js';
export type { Checkpoint, WorkflowContextInit } from './core/context.js';
export * from './core/primitive.js';

// Composition
export * from './composition/sequential.js';
export * from './composition/parallel.js';
export * from './composition/router.js';
export * from './composition/conditional.js';
export * from './composition/pipeline.js';

// Recovery
export * from './recovery/backoff.js';
export * from './recovery/retry.js';
export * from './recovery/timeout.js';
export * from './recovery/fallback.js';
export * from './recovery/circuit_breaker.js';
export * from './recovery/compensation.js';

// Performance
export * from './performance/lru_store.js';
export * from './performance/cache.js';

// Storage
export type { RemoteStore, RemoteSearchFilters, RemoteSearchResult } from './storage/types.js';
export * from './storage/sqlite_remote_store.js';

// Memory
export * from './memory/types.js';
export * from './memory/in_memory_store.js';
export * from './memory/hybrid_store.js';
export * from './memory/session_memory.js';
export * from './memory/window_memory.js';
export * from './memory/deep_memory.js';
export * from './memory/relevance.js';
export * from './memory/fact_registry.js';
export * from './memory/fact_loader.js';
export * from './memory/memory_primitive.js';

// Observability
export * from './observability/sink.js';
export * from './observability/in_memory_sink.js';
export * from './observability/logging_sink.js';
export * from './observability/instrumentation.js';
export * from './telemetry/logger.js';

// Configuration & runtime
export * from './config/runtime_config.js';
export * from './runtime.js';

// Utilities
export { getErrorMessage, toError, assert } from './utils/errors.js';
export { createMutex, sleep, linkAbort, throwIfAborted, type Mutex } from './utils/async.js';
export { stableStringify, computeContentHash } from './utils/hashing.js';
export { ManualClock, InstantClock, flushMicrotasks } from './testing/manual_clock.js';
