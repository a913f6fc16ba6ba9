/**
 * @fileoverview Async Utilities
 *
 * Shared async helper functions used across the codebase.
 *
 * @packageDocumentation
 */

import { CancelledError } from '../core/errors.js';
import { getErrorMessage } from './errors.js';

// ============================================================================
// MUTEX
// ============================================================================

export interface Mutex {
  run<T>(fn: () => Promise<T> | T): Promise<T>;
}

/**
 * Promise-chain mutex: callbacks run one at a time in submission order.
 * A failing callback does not poison the chain for later callers.
 */
export function createMutex(): Mutex {
  let chain: Promise<void> = Promise.resolve();
  return {
    run<T>(fn: () => Promise<T> | T): Promise<T> {
      const next = chain.then(fn, fn);
      chain = next.then(() => undefined, () => undefined);
      return next;
    },
  };
}

// ============================================================================
// SLEEP
// ============================================================================

function abortReason(signal: AbortSignal): string | undefined {
  return signal.reason === undefined ? undefined : getErrorMessage(signal.reason);
}

/**
 * Resolve after `ms`, or reject with CancelledError as soon as `signal`
 * aborts. The timer is cleared either way.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError('sleep', abortReason(signal)));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('sleep', signal ? abortReason(signal) : undefined));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with CancelledError as soon as `signal`
 * aborts. The promise itself keeps running; only this caller stops waiting.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined, primitive: string): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError(primitive, abortReason(signal)));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError(primitive, abortReason(signal)));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Abort `controller` when `parent` aborts. Returns the unlink function;
 * call it once the controller is no longer in use.
 */
export function linkAbort(parent: AbortSignal | undefined, controller: AbortController): () => void {
  if (!parent) {
    return () => undefined;
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return () => undefined;
  }
  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

/**
 * Throw CancelledError if the signal has already fired. Leaves call this
 * between units of work to honour cooperative cancellation.
 */
export function throwIfAborted(signal: AbortSignal | undefined, primitive: string): void {
  if (signal?.aborted) {
    throw new CancelledError(primitive, abortReason(signal));
  }
}
