/**
 * @fileoverview loomwork error hierarchy
 *
 * Every failure raised by the runtime itself is a typed PrimitiveError with a
 * stable code and a retryable flag. Errors thrown by leaf primitives pass
 * through untouched unless a decorator handles them.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class PrimitiveError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// OPERATION ERRORS
// ============================================================================

/**
 * Native failure of a wrapped leaf, for providers that want a typed error
 * instead of throwing whatever their client library throws.
 */
export class OperationError extends PrimitiveError {
  readonly code = 'OPERATION_ERROR';

  constructor(
    readonly primitive: string,
    message: string,
    readonly retryable: boolean = true,
    readonly cause?: Error,
  ) {
    super(`Primitive ${primitive} failed: ${message}`);
    this.name = 'OperationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        primitive: this.primitive,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// TIMEOUT / CANCELLATION
// ============================================================================

export class TimeoutError extends PrimitiveError {
  readonly code = 'TIMEOUT_ERROR';
  readonly retryable = true;

  constructor(
    readonly primitive: string,
    readonly timeoutMs: number,
  ) {
    super(`Primitive ${primitive} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        primitive: this.primitive,
        timeoutMs: this.timeoutMs,
      },
    };
  }
}

export class CancelledError extends PrimitiveError {
  readonly code = 'CANCELLED_ERROR';
  readonly retryable = false;

  constructor(
    readonly primitive: string,
    readonly reason?: string,
  ) {
    super(reason ? `Primitive ${primitive} was cancelled: ${reason}` : `Primitive ${primitive} was cancelled`);
    this.name = 'CancelledError';
  }
}

// ============================================================================
// ROUTING / CONFIGURATION
// ============================================================================

export class RoutingError extends PrimitiveError {
  readonly code = 'ROUTING_ERROR';
  readonly retryable = false;

  constructor(
    readonly router: string,
    readonly routeKey: string | undefined,
    readonly availableRoutes: readonly string[],
    readonly cause?: Error,
  ) {
    super(
      routeKey === undefined
        ? `Router ${router} could not select a route: ${cause?.message ?? 'selector failed'}`
        : `Router ${router} has no route '${routeKey}' (available: ${availableRoutes.join(', ')})`,
    );
    this.name = 'RoutingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        router: this.router,
        routeKey: this.routeKey,
        availableRoutes: [...this.availableRoutes],
        cause: this.cause?.message,
      },
    };
  }
}

export class ConfigurationError extends PrimitiveError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: [...this.issues] },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StoreOperation = 'add' | 'get' | 'search' | 'delete' | 'connect';

/**
 * A cache or memory backend could not be reached. Stores log this and
 * degrade to their local behaviour; it is only thrown to callers of a
 * RemoteStore used directly.
 */
export class StoreUnavailableError extends PrimitiveError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly store: string,
    readonly operation: StoreOperation,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Store ${store} unavailable during ${operation}: ${message}`);
    this.name = 'StoreUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        store: this.store,
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends PrimitiveError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CIRCUIT BREAKER
// ============================================================================

export class CircuitOpenError extends PrimitiveError {
  readonly code = 'CIRCUIT_OPEN';
  readonly retryable = true;

  constructor(
    readonly primitive: string,
    readonly retryAfterMs: number,
  ) {
    super(`Circuit for ${primitive} is open (retry in ${Math.max(0, Math.ceil(retryAfterMs))}ms)`);
    this.name = 'CircuitOpenError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        primitive: this.primitive,
        retryAfterMs: this.retryAfterMs,
      },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isPrimitiveError(error: unknown): error is PrimitiveError {
  return error instanceof PrimitiveError;
}

/**
 * Default retry policy: everything is retryable except errors that say
 * otherwise (validation, configuration, routing, cancellation).
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof PrimitiveError) {
    return error.retryable;
  }
  return true;
}

const RETRY_ATTEMPTS = 'retryAttempts';

/**
 * Record on a re-raised error how many attempts were made before giving up.
 * The error keeps its identity; frozen errors are left as they are.
 */
export function annotateRetryAttempts<E extends Error>(error: E, attempts: number): E {
  if (Object.isExtensible(error)) {
    Object.defineProperty(error, RETRY_ATTEMPTS, {
      value: attempts,
      enumerable: false,
      configurable: true,
      writable: true,
    });
  }
  return error;
}

export function getRetryAttempts(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !(RETRY_ATTEMPTS in error)) {
    return undefined;
  }
  const attempts: unknown = Reflect.get(error, RETRY_ATTEMPTS);
  return typeof attempts === 'number' ? attempts : undefined;
}
