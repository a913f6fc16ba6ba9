/**
 * @fileoverview Timeout decorator
 *
 * Bounds how long the caller waits for the wrapped primitive. On expiry the
 * in-flight operation is signalled through `ctx.signal` and then either a
 * TimeoutError is raised or the configured fallback is used.
 *
 * This is a soft timeout: work that never yields cannot be interrupted, so
 * the decorator stops waiting and ignores whatever the operation does later.
 *
 * For "time-bound, then degrade" wrap it in a Fallback:
 * `withFallback(withTimeout(op, { timeoutMs: 500 }), [alternative])`.
 */

import type { WorkflowContext } from '../core/context.js';
import { ConfigurationError, TimeoutError } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { emitEvent } from '../observability/instrumentation.js';
import { linkAbort } from '../utils/async.js';

export type TimeoutFallback<TIn, TOut> =
  | { kind: 'value'; value: TOut }
  | { kind: 'primitive'; primitive: Primitive<TIn, TOut> };

export interface TimeoutOptions<TIn, TOut> extends PrimitiveOptions {
  timeoutMs: number;
  fallback?: TimeoutFallback<TIn, TOut>;
}

// 'stopped': the timer was cancelled or failed before the operation settled
type RaceOutcome<T> = { kind: 'done'; value: T } | { kind: 'expired' } | { kind: 'stopped' };

export class TimeoutPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'timeout';
  readonly timeoutMs: number;
  private readonly fallback?: TimeoutFallback<TIn, TOut>;

  constructor(
    private readonly inner: Primitive<TIn, TOut>,
    options: TimeoutOptions<TIn, TOut>,
  ) {
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new ConfigurationError(`Timeout must be a positive number of milliseconds, got ${options.timeoutMs}`);
    }
    super(`Timeout(${inner.name}, ${options.timeoutMs}ms)`, options);
    this.timeoutMs = options.timeoutMs;
    this.fallback = options.fallback;
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    const operationController = new AbortController();
    const timerController = new AbortController();
    const unlink = linkAbort(ctx.signal, operationController);

    let outcome: RaceOutcome<TOut>;
    try {
      const operation = this.inner.execute(input, ctx.withSignal(operationController.signal));
      outcome = await Promise.race<RaceOutcome<TOut>>([
        operation.then((value): RaceOutcome<TOut> => ({ kind: 'done', value })),
        this.clock.sleep(this.timeoutMs, timerController.signal).then(
          (): RaceOutcome<TOut> => ({ kind: 'expired' }),
          (): RaceOutcome<TOut> => ({ kind: 'stopped' }),
        ),
      ]);
    } finally {
      timerController.abort();
      unlink();
    }

    if (outcome.kind === 'done') {
      return outcome.value;
    }

    const error = new TimeoutError(this.inner.name, this.timeoutMs);
    operationController.abort(error);
    emitEvent(this.instrumentation, 'timeout.expired', ctx, {
      timeout: this.name,
      timeoutMs: this.timeoutMs,
      fallback: this.fallback?.kind ?? 'none',
    });

    if (!this.fallback) {
      throw error;
    }
    this.logger.info(`Timeout ${this.name} expired; using ${this.fallback.kind} fallback`, {
      correlationId: ctx.correlationId,
    });
    if (this.fallback.kind === 'value') {
      return this.fallback.value;
    }
    return this.fallback.primitive.execute(input, ctx);
  }
}

export function withTimeout<TIn, TOut>(
  primitive: Primitive<TIn, TOut>,
  options: TimeoutOptions<TIn, TOut>,
): TimeoutPrimitive<TIn, TOut> {
  return new TimeoutPrimitive(primitive, options);
}
