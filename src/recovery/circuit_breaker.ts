/**
 * @fileoverview Circuit breaker decorator
 *
 *   closed --(failureThreshold consecutive failures)--> open
 *   open --(recoveryTimeoutMs elapsed)--> half-open
 *   half-open --(trial succeeds)--> closed
 *   half-open --(trial fails)--> open
 *
 * While open, and while the single half-open trial is in flight, calls are
 * rejected with CircuitOpenError without touching the wrapped primitive.
 */

import type { WorkflowContext } from '../core/context.js';
import { CircuitOpenError, ConfigurationError } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { countMetric, emitEvent } from '../observability/instrumentation.js';
import { METRIC_CIRCUIT_TRANSITIONS } from '../observability/sink.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions extends PrimitiveOptions {
  /** Consecutive failures that open the circuit. Default: 5 */
  failureThreshold?: number;
  /** Time spent open before a trial call is allowed. Default: 60000 */
  recoveryTimeoutMs?: number;
}

export interface CircuitSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt: number | null;
}

export class CircuitBreakerPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'circuit_breaker';
  readonly failureThreshold: number;
  readonly recoveryTimeoutMs: number;

  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;

  constructor(
    private readonly inner: Primitive<TIn, TOut>,
    options: CircuitBreakerOptions = {},
  ) {
    const failureThreshold = options.failureThreshold ?? 5;
    const recoveryTimeoutMs = options.recoveryTimeoutMs ?? 60_000;
    if (!Number.isInteger(failureThreshold) || failureThreshold < 1) {
      throw new ConfigurationError(`CircuitBreaker failureThreshold must be a positive integer, got ${failureThreshold}`);
    }
    if (!Number.isFinite(recoveryTimeoutMs) || recoveryTimeoutMs < 0) {
      throw new ConfigurationError(`CircuitBreaker recoveryTimeoutMs must be >= 0, got ${recoveryTimeoutMs}`);
    }
    super(`CircuitBreaker(${inner.name})`, options);
    this.failureThreshold = failureThreshold;
    this.recoveryTimeoutMs = recoveryTimeoutMs;
  }

  /** Current state; an open circuit past its recovery time reports half-open. */
  getState(): CircuitState {
    if (this.state === 'open' && this.recoveryElapsed()) {
      return 'half-open';
    }
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    return { state: this.getState(), consecutiveFailures: this.consecutiveFailures, openedAt: this.openedAt };
  }

  /** Force the circuit closed and forget past failures. */
  reset(): void {
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.trialInFlight = false;
    if (this.state !== 'closed') {
      this.transition('closed', undefined, 'reset');
    }
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    const isTrial = this.admit(ctx);
    try {
      const output = await this.inner.execute(input, ctx);
      this.recordSuccess(isTrial, ctx);
      return output;
    } catch (error) {
      this.recordFailure(isTrial, ctx);
      throw error;
    } finally {
      if (isTrial) {
        this.trialInFlight = false;
      }
    }
  }

  /** Returns true when this call is the half-open trial. */
  private admit(ctx: WorkflowContext): boolean {
    if (this.state === 'open') {
      if (!this.recoveryElapsed()) {
        throw new CircuitOpenError(this.inner.name, this.remainingOpenMs());
      }
      this.transition('half-open', ctx, 'recovery timeout elapsed');
    }
    if (this.state === 'half-open') {
      if (this.trialInFlight) {
        throw new CircuitOpenError(this.inner.name, 0);
      }
      this.trialInFlight = true;
      return true;
    }
    return false;
  }

  // Only the trial decides a half-open circuit. Calls admitted while closed
  // that settle later count toward the threshold only if it is still closed.

  private recordSuccess(isTrial: boolean, ctx: WorkflowContext): void {
    if (isTrial) {
      if (this.state !== 'half-open') return;
      this.consecutiveFailures = 0;
      this.openedAt = null;
      this.transition('closed', ctx, 'trial call succeeded');
      return;
    }
    if (this.state === 'closed') {
      this.consecutiveFailures = 0;
    }
  }

  private recordFailure(isTrial: boolean, ctx: WorkflowContext): void {
    if (isTrial) {
      if (this.state !== 'half-open') return;
      this.openedAt = this.clock.now();
      this.transition('open', ctx, 'trial call failed');
      return;
    }
    if (this.state !== 'closed') return;
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.failureThreshold) {
      this.openedAt = this.clock.now();
      this.transition('open', ctx, `${this.consecutiveFailures} consecutive failures`);
    }
  }

  private recoveryElapsed(): boolean {
    return this.openedAt !== null && this.clock.now() - this.openedAt >= this.recoveryTimeoutMs;
  }

  private remainingOpenMs(): number {
    if (this.openedAt === null) return 0;
    return Math.max(0, this.openedAt + this.recoveryTimeoutMs - this.clock.now());
  }

  private transition(to: CircuitState, ctx: WorkflowContext | undefined, reason: string): void {
    const from = this.state;
    this.state = to;
    const message = `Circuit ${this.name} ${from} -> ${to}: ${reason}`;
    const context = ctx ? { correlationId: ctx.correlationId } : undefined;
    if (to === 'open') {
      this.logger.warn(message, context);
    } else {
      this.logger.info(message, context);
    }
    countMetric(this.instrumentation, METRIC_CIRCUIT_TRANSITIONS, { primitive: this.name, to });
    emitEvent(this.instrumentation, 'circuit.state_change', ctx, { circuit: this.name, from, to, reason });
  }
}

export function withCircuitBreaker<TIn, TOut>(
  primitive: Primitive<TIn, TOut>,
  options: CircuitBreakerOptions = {},
): CircuitBreakerPrimitive<TIn, TOut> {
  return new CircuitBreakerPrimitive(primitive, options);
}
