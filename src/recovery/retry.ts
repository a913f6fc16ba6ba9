/**
 * @fileoverview Retry decorator
 *
 * Re-invokes the wrapped primitive on failure up to `maxRetries` additional
 * times, sleeping between attempts according to the backoff strategy.
 * After exhaustion (or a non-retryable error) the last error is re-raised
 * with the number of attempts recorded on it.
 */

import type { WorkflowContext } from '../core/context.js';
import { annotateRetryAttempts, ConfigurationError, isRetryableError } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { countMetric, emitEvent } from '../observability/instrumentation.js';
import { METRIC_RETRY_ATTEMPTS } from '../observability/sink.js';
import { getErrorMessage } from '../utils/errors.js';
import { computeBackoffDelay, type BackoffStrategy } from './backoff.js';

export interface RetryAttemptEvent {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions extends PrimitiveOptions {
  /** Additional attempts after the first. Default: 3 */
  maxRetries?: number;
  /** Default: exponential */
  strategy?: BackoffStrategy;
  /** Default: 100 */
  baseDelayMs?: number;
  /** Default: 10000 */
  maxDelayMs?: number;
  /** Default: true */
  jitter?: boolean;
  /** Decides whether a failure is worth another attempt. Default: isRetryableError */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (event: RetryAttemptEvent) => void;
  random?: () => number;
}

export const DEFAULT_RETRY = {
  maxRetries: 3,
  strategy: 'exponential',
  baseDelayMs: 100,
  maxDelayMs: 10_000,
  jitter: true,
} as const;

export class RetryPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'retry';
  readonly maxRetries: number;
  private readonly strategy: BackoffStrategy;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitter: boolean;
  private readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  private readonly onRetry?: (event: RetryAttemptEvent) => void;
  private readonly random?: () => number;

  constructor(
    private readonly inner: Primitive<TIn, TOut>,
    options: RetryOptions = {},
  ) {
    const maxRetries = options.maxRetries ?? DEFAULT_RETRY.maxRetries;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigurationError(`Retry maxRetries must be a non-negative integer, got ${maxRetries}`);
    }
    super(`Retry(${inner.name})`, options);
    this.maxRetries = maxRetries;
    this.strategy = options.strategy ?? DEFAULT_RETRY.strategy;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs;
    this.jitter = options.jitter ?? DEFAULT_RETRY.jitter;
    this.shouldRetry = options.shouldRetry ?? ((error) => isRetryableError(error));
    this.onRetry = options.onRetry;
    this.random = options.random;
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.inner.execute(input, ctx);
      } catch (error) {
        const attempts = attempt + 1;
        if (attempt >= this.maxRetries || !this.shouldRetry(error, attempts)) {
          if (error instanceof Error) {
            annotateRetryAttempts(error, attempts);
          }
          if (attempts > 1) {
            this.logger.warn(`Retry ${this.name} gave up after ${attempts} attempts`, {
              error: getErrorMessage(error),
              correlationId: ctx.correlationId,
            });
          }
          throw error;
        }

        const delayMs = computeBackoffDelay(attempt, {
          strategy: this.strategy,
          baseDelayMs: this.baseDelayMs,
          maxDelayMs: this.maxDelayMs,
          jitter: this.jitter,
          random: this.random,
        });
        countMetric(this.instrumentation, METRIC_RETRY_ATTEMPTS, { primitive: this.name });
        emitEvent(this.instrumentation, 'retry.attempt', ctx, {
          retry: this.name,
          attempt: attempts,
          delayMs,
          error: getErrorMessage(error),
        });
        this.logger.debug(`Retry ${this.name} attempt ${attempts} failed; waiting ${Math.round(delayMs)}ms`, {
          error: getErrorMessage(error),
        });
        this.notify({ attempt: attempts, delayMs, error });

        await this.clock.sleep(delayMs, ctx.signal);
      }
    }
  }

  private notify(event: RetryAttemptEvent): void {
    if (!this.onRetry) return;
    try {
      this.onRetry(event);
    } catch (error) {
      this.logger.debug(`Retry ${this.name} onRetry hook failed`, { error: getErrorMessage(error) });
    }
  }
}

export function withRetry<TIn, TOut>(primitive: Primitive<TIn, TOut>, options: RetryOptions = {}): RetryPrimitive<TIn, TOut> {
  return new RetryPrimitive(primitive, options);
}
