/**
 * @fileoverview Time source injected into time-dependent primitives
 * (Cache TTL, CircuitBreaker recovery, Retry backoff, Timeout, Window memory).
 */

import { sleep } from '../utils/async.js';

export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
  /** Resolves after `ms`; rejects with CancelledError when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => sleep(ms, signal),
};
