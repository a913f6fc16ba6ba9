/**
 * @fileoverview Observability sink contract
 *
 * Where spans, events and metrics go. The runtime never depends on a
 * concrete tracing or metrics backend; adapters implement this interface.
 */

export type Attributes = Record<string, unknown>;
export type Labels = Record<string, string>;

export type SpanStatus = 'ok' | 'error';

export interface SpanOptions {
  parentSpanId?: string;
  attributes?: Attributes;
}

export interface ObservabilitySink {
  /** Start a span and return its id. */
  startSpan(name: string, options?: SpanOptions): string;
  /** End a span with a final status. */
  endSpan(spanId: string, status: SpanStatus, attributes?: Attributes): void;
  /** Record a point-in-time event, optionally attached to a span. */
  addEvent(name: string, attributes?: Attributes, spanId?: string): void;
  incrementCounter(name: string, labels?: Labels, value?: number): void;
  recordHistogram(name: string, value: number, labels?: Labels): void;
}

export const NOOP_SINK: ObservabilitySink = {
  startSpan: () => '',
  endSpan: () => undefined,
  addEvent: () => undefined,
  incrementCounter: () => undefined,
  recordHistogram: () => undefined,
};

// ============================================================================
// METRIC NAMES
// ============================================================================

export const METRIC_EXECUTIONS = 'primitive_executions_total';
export const METRIC_DURATION = 'primitive_duration_ms';
export const METRIC_ROUTER_DECISIONS = 'router_decisions_total';
export const METRIC_CACHE_LOOKUPS = 'cache_lookups_total';
export const METRIC_RETRY_ATTEMPTS = 'retry_attempts_total';
export const METRIC_CIRCUIT_TRANSITIONS = 'circuit_state_transitions_total';
