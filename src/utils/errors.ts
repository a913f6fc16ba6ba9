/**
 * @fileoverview Error Utilities
 * Re-exports the error taxonomy plus helpers for values of unknown shape
 * caught from user code.
 */

export * from '../core/errors.js';

/** Message of anything thrown: Errors, strings, and objects carrying `message`. */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

/**
 * Normalize a thrown value into an Error instance.
 * Errors pass through untouched so identity checks keep working.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`);
  }
}
