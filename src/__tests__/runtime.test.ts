import { describe, expect, it, vi } from 'vitest';
import { createRuntime } from '../runtime.js';
import { ConfigurationError } from '../core/errors.js';
import { fromFunction } from '../core/primitive.js';
import { InMemorySink } from '../observability/in_memory_sink.js';
import { silentLogger } from '../telemetry/logger.js';
import { InstantClock, ManualClock } from '../testing/manual_clock.js';

describe('createRuntime', () => {
  it('applies configured defaults to the primitives it builds', () => {
    const runtime = createRuntime(
      { timeout: { timeoutMs: 250 }, circuitBreaker: { failureThreshold: 2 }, memory: { windowMs: 60_000 } },
      { logger: silentLogger },
    );
    const op = fromFunction('op', (n: number) => n);

    expect(runtime.timeout(op).timeoutMs).toBe(250);
    expect(runtime.timeout(op, { timeoutMs: 50 }).timeoutMs).toBe(50);
    expect(runtime.circuitBreaker(op).failureThreshold).toBe(2);
    expect(runtime.circuitBreaker(op).recoveryTimeoutMs).toBe(60_000);
    expect(runtime.cache(op).ttlMs).toBe(300_000);
    expect(runtime.cache(op, { singleFlight: false }).singleFlight).toBe(false);
    expect(runtime.memory().window.windowMs).toBe(60_000);
  });

  it('retries with the configured backoff on the injected clock', async () => {
    const clock = new InstantClock();
    const runtime = createRuntime({ retry: { maxRetries: 2, jitter: false, baseDelayMs: 10 } }, { clock, logger: silentLogger });
    const failing = vi.fn((_n: number): number => {
      throw new Error('nope');
    });

    await expect(runtime.retry(runtime.fn('failing', failing)).execute(1)).rejects.toThrow('nope');
    expect(failing).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([10, 20]);
  });

  it('shares its sink and clock with everything it builds', async () => {
    const clock = new ManualClock(500);
    const sink = new InMemorySink(() => clock.now());
    const runtime = createRuntime({}, { clock, sink, logger: silentLogger });

    const workflow = runtime
      .pipeline(runtime.fn('parse', (text: string) => Number.parseInt(text, 10)))
      .then(runtime.fn('double', (n: number) => n * 2))
      .build();
    const ctx = runtime.context({ sessionId: 's-1' });

    expect(await workflow.execute('4', ctx)).toBe(8);
    expect(sink.spans.map((span) => span.name)).toEqual(['Sequential(parse >> double)', 'parse', 'double']);
    expect(ctx.sessionId).toBe('s-1');
    expect(ctx.checkpoints[0]?.timestamp).toBe(500);
  });

  it('builds composition primitives', async () => {
    const runtime = createRuntime({}, { logger: silentLogger });
    const fast = runtime.fn('fast', (n: number) => `fast:${n}`);
    const slow = runtime.fn('slow', (n: number) => `slow:${n}`);

    expect(await runtime.parallel([fast, slow]).execute(1)).toEqual(['fast:1', 'slow:1']);
    expect(await runtime.when((n: number) => n > 10, slow, fast).execute(20)).toBe('slow:20');
    expect(
      await runtime.router({ routes: { fast, slow }, select: (n: number) => (n > 10 ? 'slow' : 'fast') }).execute(3),
    ).toBe('fast:3');
    expect(await runtime.fallback(runtime.fn('broken', (_n: number): string => {
      throw new Error('x');
    }), fast).execute(2)).toBe('fast:2');
    expect(await runtime.sequence(fast).execute(5)).toBe('fast:5');
  });

  it('builds a parallel that reports every branch outcome when failFast is off', async () => {
    const runtime = createRuntime({}, { logger: silentLogger });
    const fast = runtime.fn('fast', (n: number) => `fast:${n}`);
    const broken = runtime.fn('broken', (_n: number): string => {
      throw new Error('branch failed');
    });

    const outcomes = await runtime.parallel([fast, broken], { failFast: false }).execute(1);
    expect(outcomes[0]).toEqual({ ok: true, value: 'fast:1' });
    expect(outcomes[1]?.ok).toBe(false);
    expect(outcomes[1]?.ok === false ? outcomes[1].error.message : undefined).toBe('branch failed');
    await expect(runtime.parallel([fast, broken]).execute(1)).rejects.toThrow('branch failed');
  });

  it('rejects invalid configuration', () => {
    expect(() => createRuntime({ retry: { maxRetries: -1 } })).toThrow(ConfigurationError);
  });
});
