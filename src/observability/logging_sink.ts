import type { Logger } from '../telemetry/logger.js';
import type { ObservabilitySink } from './sink.js';

/**
 * Sink that turns spans and events into debug log lines. Metrics are
 * dropped; use a metrics adapter when they matter.
 */
export function createLoggingSink(logger: Logger): ObservabilitySink {
  let nextSpan = 0;
  const names = new Map<string, string>();
  return {
    startSpan(name, options) {
      nextSpan += 1;
      const spanId = `log-${nextSpan}`;
      names.set(spanId, name);
      logger.debug(`span start ${name}`, { spanId, ...options?.attributes });
      return spanId;
    },
    endSpan(spanId, status, attributes) {
      const name = names.get(spanId) ?? spanId;
      names.delete(spanId);
      const message = `span end ${name} (${status})`;
      if (status === 'error') {
        logger.warn(message, { spanId, ...attributes });
      } else {
        logger.debug(message, { spanId, ...attributes });
      }
    },
    addEvent(name, attributes, spanId) {
      logger.debug(`event ${name}`, spanId ? { spanId, ...attributes } : { ...attributes });
    },
    incrementCounter: () => undefined,
    recordHistogram: () => undefined,
  };
}
