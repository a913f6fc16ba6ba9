/**
 * @fileoverview Node-boundary instrumentation
 *
 * Every primitive execution is wrapped by `observe`: a span carrying the
 * context's correlation and trace ids, an execution counter and duration
 * histogram labelled by primitive and status, `<name>.start` / `<name>.end`
 * checkpoints, and the user's entry/exit/error hooks.
 *
 * Nothing here may change a primitive's outcome. Sink and hook failures are
 * logged at debug level and dropped.
 */

import type { Clock } from '../core/clock.js';
import type { WorkflowContext } from '../core/context.js';
import { getErrorMessage } from '../utils/errors.js';
import type { Logger } from '../telemetry/logger.js';
import { METRIC_DURATION, METRIC_EXECUTIONS, type ObservabilitySink, type SpanStatus } from './sink.js';

// ============================================================================
// HOOK EVENTS
// ============================================================================

export interface PrimitiveEntryEvent {
  primitive: string;
  kind: string;
  correlationId: string;
  spanId: string;
  timestamp: number;
  input: unknown;
}

export interface PrimitiveExitEvent extends PrimitiveEntryEvent {
  output: unknown;
  durationMs: number;
}

export interface PrimitiveErrorEvent extends PrimitiveEntryEvent {
  error: Error;
  durationMs: number;
}

export interface InstrumentationHooks {
  onEntry?(event: PrimitiveEntryEvent): void;
  onExit?(event: PrimitiveExitEvent): void;
  onError?(event: PrimitiveErrorEvent): void;
}

export interface Instrumentation {
  sink: ObservabilitySink;
  logger: Logger;
  clock: Clock;
  hooks?: InstrumentationHooks;
}

// ============================================================================
// OBSERVE
// ============================================================================

function guarded(logger: Logger, what: string, primitive: string, fn: () => void): void {
  try {
    fn();
  } catch (error) {
    logger.debug(`Instrumentation ${what} failed for ${primitive}`, { error: getErrorMessage(error) });
  }
}

export async function observe<T>(
  primitive: string,
  kind: string,
  input: unknown,
  ctx: WorkflowContext,
  instrumentation: Instrumentation,
  run: () => Promise<T>,
): Promise<T> {
  const { sink, logger, clock, hooks } = instrumentation;
  const startedAt = clock.now();
  let spanId = '';

  guarded(logger, 'startSpan', primitive, () => {
    spanId = sink.startSpan(primitive, {
      parentSpanId: ctx.spanId,
      attributes: { ...ctx.toTraceAttributes(), 'primitive.name': primitive, 'primitive.kind': kind },
    });
  });
  ctx.checkpoint(`${primitive}.start`);

  const base: PrimitiveEntryEvent = {
    primitive,
    kind,
    correlationId: ctx.correlationId,
    spanId: ctx.spanId,
    timestamp: startedAt,
    input,
  };
  if (hooks?.onEntry) {
    const onEntry = hooks.onEntry.bind(hooks);
    guarded(logger, 'onEntry', primitive, () => onEntry(base));
  }

  const finish = (status: SpanStatus, durationMs: number, error?: Error): void => {
    ctx.checkpoint(`${primitive}.end`);
    const labels = { primitive, status };
    guarded(logger, 'endSpan', primitive, () =>
      sink.endSpan(spanId, status, error ? { 'error.message': error.message, 'error.name': error.name } : undefined),
    );
    guarded(logger, 'counter', primitive, () => sink.incrementCounter(METRIC_EXECUTIONS, labels));
    guarded(logger, 'histogram', primitive, () => sink.recordHistogram(METRIC_DURATION, durationMs, labels));
  };

  try {
    const output = await run();
    const durationMs = clock.now() - startedAt;
    finish('ok', durationMs);
    if (hooks?.onExit) {
      const onExit = hooks.onExit.bind(hooks);
      guarded(logger, 'onExit', primitive, () => onExit({ ...base, output, durationMs }));
    }
    return output;
  } catch (error) {
    const durationMs = clock.now() - startedAt;
    const normalized = error instanceof Error ? error : new Error(getErrorMessage(error));
    finish('error', durationMs, normalized);
    if (hooks?.onError) {
      const onError = hooks.onError.bind(hooks);
      guarded(logger, 'onError', primitive, () => onError({ ...base, error: normalized, durationMs }));
    }
    throw error;
  }
}

/**
 * Emit a structured event tied to the context's span without letting a
 * failing sink escape.
 */
export function emitEvent(
  instrumentation: Pick<Instrumentation, 'sink' | 'logger'>,
  name: string,
  ctx: WorkflowContext | undefined,
  attributes: Record<string, unknown> = {},
): void {
  guarded(instrumentation.logger, `event ${name}`, name, () =>
    instrumentation.sink.addEvent(
      name,
      ctx ? { 'workflow.correlation_id': ctx.correlationId, ...attributes } : attributes,
      ctx?.spanId,
    ),
  );
}

/** Counter increment that never throws. */
export function countMetric(
  instrumentation: Pick<Instrumentation, 'sink' | 'logger'>,
  name: string,
  labels: Record<string, string>,
): void {
  guarded(instrumentation.logger, `counter ${name}`, name, () => instrumentation.sink.incrementCounter(name, labels));
}
