import { describe, expect, it, vi } from 'vitest';
import { computeBackoffDelay } from '../backoff.js';
import { withRetry } from '../retry.js';
import { ConfigurationError, ValidationError, getRetryAttempts } from '../../core/errors.js';
import { fromFunction } from '../../core/primitive.js';
import { InMemorySink } from '../../observability/in_memory_sink.js';
import { METRIC_RETRY_ATTEMPTS } from '../../observability/sink.js';
import { silentLogger } from '../../telemetry/logger.js';
import { InstantClock } from '../../testing/manual_clock.js';

function flaky(failures: number) {
  let calls = 0;
  const fn = vi.fn((input: string) => {
    calls += 1;
    if (calls <= failures) {
      throw new Error(`failure ${calls}`);
    }
    return `${input}:ok`;
  });
  return { fn, primitive: fromFunction('flaky', fn) };
}

describe('computeBackoffDelay', () => {
  const base = { baseDelayMs: 100, maxDelayMs: 10_000, jitter: false };

  it('grows by strategy', () => {
    expect([0, 1, 2].map((a) => computeBackoffDelay(a, { ...base, strategy: 'exponential' }))).toEqual([100, 200, 400]);
    expect([0, 1, 2].map((a) => computeBackoffDelay(a, { ...base, strategy: 'linear' }))).toEqual([100, 200, 300]);
    expect([0, 1, 2].map((a) => computeBackoffDelay(a, { ...base, strategy: 'fixed' }))).toEqual([100, 100, 100]);
  });

  it('caps at maxDelayMs', () => {
    expect(computeBackoffDelay(5, { ...base, strategy: 'exponential', maxDelayMs: 250 })).toBe(250);
  });

  it('scales by a jitter factor in [0.5, 1.5)', () => {
    expect(computeBackoffDelay(2, { ...base, strategy: 'exponential', jitter: true, random: () => 0 })).toBe(200);
    expect(computeBackoffDelay(2, { ...base, strategy: 'exponential', jitter: true, random: () => 0.5 })).toBe(400);
  });
});

describe('Retry', () => {
  it('makes maxRetries + 1 attempts before giving up', async () => {
    const clock = new InstantClock();
    const { fn, primitive } = flaky(Infinity);
    const retry = withRetry(primitive, { maxRetries: 3, jitter: false, clock, logger: silentLogger });

    const failure = await retry.execute('job').catch((error: unknown) => error);

    expect(fn).toHaveBeenCalledTimes(4);
    expect(failure).toBeInstanceOf(Error);
    expect(failure instanceof Error ? failure.message : '').toBe('failure 4');
    expect(getRetryAttempts(failure)).toBe(4);
    expect(clock.sleeps).toEqual([100, 200, 400]);
  });

  it('returns the first success', async () => {
    const clock = new InstantClock();
    const { fn, primitive } = flaky(2);
    const retry = withRetry(primitive, { strategy: 'linear', baseDelayMs: 50, jitter: false, clock });
    expect(await retry.execute('job')).toBe('job:ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([50, 100]);
    expect(clock.now()).toBe(150);
  });

  it('does not retry non-retryable errors', async () => {
    const clock = new InstantClock();
    const invalid = new ValidationError('payload', 'object', 'string');
    const fn = vi.fn((_input: string): string => {
      throw invalid;
    });
    const retry = withRetry(fromFunction('strict', fn), { clock, logger: silentLogger });
    await expect(retry.execute('x')).rejects.toBe(invalid);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(getRetryAttempts(invalid)).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('consults shouldRetry and notifies onRetry', async () => {
    const clock = new InstantClock();
    const onRetry = vi.fn();
    const { fn, primitive } = flaky(Infinity);
    const retry = withRetry(primitive, {
      maxRetries: 5,
      jitter: false,
      clock,
      logger: silentLogger,
      shouldRetry: (_error, attempt) => attempt < 2,
      onRetry,
    });
    await expect(retry.execute('x')).rejects.toThrow('failure 2');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, delayMs: 100 });
  });

  it('counts retry attempts and emits events', async () => {
    const sink = new InMemorySink(() => 0);
    const { primitive } = flaky(2);
    const retry = withRetry(primitive, { jitter: false, clock: new InstantClock(), sink });
    await retry.execute('x');
    expect(sink.counter(METRIC_RETRY_ATTEMPTS, { primitive: 'Retry(flaky)' })).toBe(2);
    expect(sink.eventsNamed('retry.attempt').map((e) => e.attributes['delayMs'])).toEqual([100, 200]);
  });

  it('rejects a negative retry count', () => {
    const { primitive } = flaky(0);
    expect(() => withRetry(primitive, { maxRetries: -1 })).toThrow(ConfigurationError);
  });
});
