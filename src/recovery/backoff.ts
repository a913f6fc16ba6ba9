export const BACKOFF_STRATEGIES = ['exponential', 'linear', 'fixed'] as const;

export type BackoffStrategy = (typeof BACKOFF_STRATEGIES)[number];

// Keeps 2^attempt finite for absurd retry counts.
const MAX_EXPONENT = 30;

export interface BackoffOptions {
  strategy: BackoffStrategy;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Multiply the delay by a factor in [0.5, 1.5). */
  jitter: boolean;
  /** Source of randomness for jitter, in [0, 1). Default: Math.random */
  random?: () => number;
}

/**
 * Delay before retry number `attempt` (0-based: the wait after the first
 * failure uses attempt 0).
 *
 * - exponential: base * 2^attempt
 * - linear: base * (attempt + 1)
 * - fixed: base
 *
 * Jitter is applied before the cap, so the result never exceeds maxDelayMs.
 */
export function computeBackoffDelay(attempt: number, options: BackoffOptions): number {
  const base = Number.isFinite(options.baseDelayMs) ? Math.max(0, options.baseDelayMs) : 0;
  const safeAttempt = Math.max(0, Math.floor(attempt));
  let delay: number;
  switch (options.strategy) {
    case 'linear':
      delay = base * (safeAttempt + 1);
      break;
    case 'fixed':
      delay = base;
      break;
    case 'exponential':
    default:
      delay = base * Math.pow(2, Math.min(safeAttempt, MAX_EXPONENT));
      break;
  }
  if (options.jitter) {
    const random = options.random ?? Math.random;
    delay *= 0.5 + random();
  }
  return Math.min(Math.max(delay, 0), Math.max(0, options.maxDelayMs));
}
