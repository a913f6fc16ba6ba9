/**
 * @fileoverview WorkflowContext
 *
 * Per-invocation carrier of correlation identity, trace linkage, metadata,
 * scratch state and checkpoints. One context flows through a Sequential;
 * each Parallel branch receives its own child.
 */

import { randomUUID } from 'node:crypto';

// ============================================================================
// TYPES
// ============================================================================

export interface Checkpoint {
  readonly name: string;
  readonly timestamp: number;
}

export interface WorkflowContextInit {
  correlationId?: string;
  causationId?: string;
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;
  workflowId?: string;
  sessionId?: string;
  metadata?: Record<string, unknown>;
  state?: Record<string, unknown>;
  baggage?: Record<string, string>;
  signal?: AbortSignal;
  /** Time source for checkpoints and elapsed time. Default: Date.now */
  now?: () => number;
}

/** @internal State shared between a context and its `withSignal` views. */
export interface SharedParts {
  metadata: Record<string, unknown>;
  state: Record<string, unknown>;
  baggage: Record<string, string>;
  checkpoints: Checkpoint[];
  startedAt: number;
}

// ============================================================================
// HELPERS
// ============================================================================

export function generateSpanId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 16);
}

/**
 * Deep copy for child state. Values structuredClone rejects (functions,
 * class instances holding handles) fall back to a shallow copy.
 */
function copyRecord<T>(record: Record<string, T>): Record<string, T> {
  try {
    return structuredClone(record);
  } catch {
    return { ...record };
  }
}

// ============================================================================
// CONTEXT
// ============================================================================

export class WorkflowContext {
  readonly correlationId: string;
  readonly causationId?: string;
  readonly traceId?: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly workflowId?: string;
  readonly sessionId?: string;
  readonly signal?: AbortSignal;

  private readonly parts: SharedParts;
  private readonly now: () => number;

  constructor(init: WorkflowContextInit = {}, shared?: SharedParts) {
    this.now = init.now ?? Date.now;
    this.correlationId = init.correlationId ?? randomUUID();
    this.causationId = init.causationId;
    this.traceId = init.traceId;
    this.spanId = init.spanId ?? generateSpanId();
    this.parentSpanId = init.parentSpanId;
    this.workflowId = init.workflowId;
    this.sessionId = init.sessionId;
    this.signal = init.signal;
    this.parts = shared ?? {
      metadata: init.metadata ?? {},
      state: init.state ?? {},
      baggage: init.baggage ?? {},
      checkpoints: [],
      startedAt: this.now(),
    };
  }

  get metadata(): Record<string, unknown> {
    return this.parts.metadata;
  }

  get state(): Record<string, unknown> {
    return this.parts.state;
  }

  get baggage(): Record<string, string> {
    return this.parts.baggage;
  }

  get checkpoints(): readonly Checkpoint[] {
    return this.parts.checkpoints;
  }

  get startedAt(): number {
    return this.parts.startedAt;
  }

  checkpoint(name: string): void {
    this.parts.checkpoints.push({ name, timestamp: this.now() });
  }

  elapsedMs(): number {
    return this.now() - this.parts.startedAt;
  }

  /**
   * Context for a concurrent branch: same correlation and trace, a new span
   * parented on this one, and independently owned state, metadata, baggage
   * and checkpoints.
   */
  createChild(overrides: { signal?: AbortSignal } = {}): WorkflowContext {
    return new WorkflowContext({
      correlationId: this.correlationId,
      causationId: this.correlationId,
      traceId: this.traceId,
      parentSpanId: this.spanId,
      workflowId: this.workflowId,
      sessionId: this.sessionId,
      metadata: copyRecord(this.parts.metadata),
      state: copyRecord(this.parts.state),
      baggage: { ...this.parts.baggage },
      signal: overrides.signal ?? this.signal,
      now: this.now,
    });
  }

  /**
   * Same context, different cancellation signal. State, metadata, baggage
   * and checkpoints are shared by reference with this instance.
   */
  withSignal(signal: AbortSignal): WorkflowContext {
    return new WorkflowContext(
      {
        correlationId: this.correlationId,
        causationId: this.causationId,
        traceId: this.traceId,
        spanId: this.spanId,
        parentSpanId: this.parentSpanId,
        workflowId: this.workflowId,
        sessionId: this.sessionId,
        signal,
        now: this.now,
      },
      this.parts,
    );
  }

  toTraceAttributes(): Record<string, string> {
    const attributes: Record<string, string> = {
      'workflow.correlation_id': this.correlationId,
      'workflow.span_id': this.spanId,
    };
    if (this.traceId) attributes['workflow.trace_id'] = this.traceId;
    if (this.parentSpanId) attributes['workflow.parent_span_id'] = this.parentSpanId;
    if (this.causationId) attributes['workflow.causation_id'] = this.causationId;
    if (this.workflowId) attributes['workflow.id'] = this.workflowId;
    if (this.sessionId) attributes['workflow.session_id'] = this.sessionId;
    return attributes;
  }
}

export function createContext(init: WorkflowContextInit = {}): WorkflowContext {
  return new WorkflowContext(init);
}
