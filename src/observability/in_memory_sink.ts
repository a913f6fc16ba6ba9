/**
 * @fileoverview Sink that keeps everything in memory for inspection.
 */

import type { Attributes, Labels, ObservabilitySink, SpanOptions, SpanStatus } from './sink.js';

export interface SpanRecord {
  spanId: string;
  name: string;
  parentSpanId?: string;
  attributes: Attributes;
  startTime: number;
  endTime?: number;
  status?: SpanStatus;
}

export interface EventRecord {
  name: string;
  attributes: Attributes;
  spanId?: string;
  timestamp: number;
}

export interface HistogramRecord {
  name: string;
  value: number;
  labels: Labels;
}

function seriesKey(name: string, labels: Labels): string {
  const parts = Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`);
  return parts.length > 0 ? `${name}{${parts.join(',')}}` : name;
}

export class InMemorySink implements ObservabilitySink {
  readonly spans: SpanRecord[] = [];
  readonly events: EventRecord[] = [];
  readonly histograms: HistogramRecord[] = [];
  private readonly counters = new Map<string, number>();
  private nextSpan = 0;

  constructor(private readonly now: () => number = Date.now) {}

  startSpan(name: string, options: SpanOptions = {}): string {
    this.nextSpan += 1;
    const spanId = `span-${this.nextSpan}`;
    this.spans.push({
      spanId,
      name,
      parentSpanId: options.parentSpanId,
      attributes: { ...options.attributes },
      startTime: this.now(),
    });
    return spanId;
  }

  endSpan(spanId: string, status: SpanStatus, attributes?: Attributes): void {
    const span = this.spans.find((s) => s.spanId === spanId);
    if (!span) return;
    span.endTime = this.now();
    span.status = status;
    Object.assign(span.attributes, attributes);
  }

  addEvent(name: string, attributes: Attributes = {}, spanId?: string): void {
    this.events.push({ name, attributes: { ...attributes }, spanId, timestamp: this.now() });
  }

  incrementCounter(name: string, labels: Labels = {}, value = 1): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels: Labels = {}): void {
    this.histograms.push({ name, value, labels: { ...labels } });
  }

  /** Current value of one counter series; 0 when never incremented. */
  counter(name: string, labels: Labels = {}): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  eventsNamed(name: string): EventRecord[] {
    return this.events.filter((event) => event.name === name);
  }

  clear(): void {
    this.spans.length = 0;
    this.events.length = 0;
    this.histograms.length = 0;
    this.counters.clear();
  }
}
