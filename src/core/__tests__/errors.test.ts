import { describe, expect, it } from 'vitest';
import {
  CancelledError,
  CircuitOpenError,
  ConfigurationError,
  OperationError,
  RoutingError,
  StoreUnavailableError,
  TimeoutError,
  ValidationError,
  annotateRetryAttempts,
  getRetryAttempts,
  isPrimitiveError,
  isRetryableError,
} from '../errors.js';

describe('error taxonomy', () => {
  it('formats messages and codes', () => {
    expect(new TimeoutError('fetch', 250).message).toBe('Primitive fetch timed out after 250ms');
    expect(new OperationError('fetch', 'boom').message).toBe('Primitive fetch failed: boom');
    expect(new RoutingError('Router(a|b)', 'c', ['a', 'b']).message).toBe(
      "Router Router(a|b) has no route 'c' (available: a, b)",
    );
    expect(new ConfigurationError('Bad config', ['retry.maxRetries: too small', 'cache.ttlMs: required']).message).toBe(
      'Bad config: retry.maxRetries: too small; cache.ttlMs: required',
    );
    expect(new ValidationError('age', 'number', 'string').message).toBe(
      'Validation failed for age: expected number, got string',
    );
    expect(new CircuitOpenError('payments', 1500.2).message).toBe('Circuit for payments is open (retry in 1501ms)');
    expect(new StoreUnavailableError('sqlite', 'get', 'disk gone').message).toBe(
      'Store sqlite unavailable during get: disk gone',
    );
  });

  it('describes a selector failure without a route key', () => {
    const error = new RoutingError('Router(a)', undefined, ['a'], new Error('no tier'));
    expect(error.message).toBe('Router Router(a) could not select a route: no tier');
    expect(error.retryable).toBe(false);
  });

  it('renders toString as [CODE] message', () => {
    expect(String(new TimeoutError('slow', 10))).toBe('[TIMEOUT_ERROR] Primitive slow timed out after 10ms');
  });

  it('serialises details in toJSON', () => {
    const json = new TimeoutError('slow', 10).toJSON();
    expect(json.code).toBe('TIMEOUT_ERROR');
    expect(json.retryable).toBe(true);
    expect(json.details).toEqual({ primitive: 'slow', timeoutMs: 10 });
  });

  it('classifies retryability', () => {
    expect(isRetryableError(new Error('plain'))).toBe(true);
    expect(isRetryableError(new TimeoutError('x', 1))).toBe(true);
    expect(isRetryableError(new ValidationError('f', 'a', 'b'))).toBe(false);
    expect(isRetryableError(new ConfigurationError('nope'))).toBe(false);
    expect(isRetryableError(new CancelledError('x'))).toBe(false);
    expect(isRetryableError(new OperationError('x', 'fatal', false))).toBe(false);
    expect(isPrimitiveError(new Error('plain'))).toBe(false);
    expect(isPrimitiveError(new CancelledError('x'))).toBe(true);
  });

  it('annotates retry attempts without changing identity', () => {
    const error = new Error('flaky');
    expect(getRetryAttempts(error)).toBeUndefined();
    expect(annotateRetryAttempts(error, 4)).toBe(error);
    expect(getRetryAttempts(error)).toBe(4);
    expect(Object.keys(error)).not.toContain('retryAttempts');
  });

  it('leaves frozen errors untouched', () => {
    const error = Object.freeze(new Error('frozen'));
    annotateRetryAttempts(error, 2);
    expect(getRetryAttempts(error)).toBeUndefined();
  });
});
