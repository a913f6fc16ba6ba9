/**
 * @fileoverview Example: guarding a slow external call
 *
 * The quote service is bounded by a timeout and retried once; when it still
 * fails, a cached-price primitive answers instead. Events and metrics land
 * in an InMemorySink so the run can be inspected afterwards.
 *
 * Run with: npx tsx examples/safe_external_call.ts
 */

import {
  InMemorySink,
  METRIC_EXECUTIONS,
  createRuntime,
  fromFunction,
  sleep,
} from '../src/index.js';

interface Quote {
  symbol: string;
  price: number;
  source: 'live' | 'stale';
}

async function main(): Promise<void> {
  const sink = new InMemorySink();
  const runtime = createRuntime({ logLevel: 'info', timeout: { timeoutMs: 200 } }, { sink });

  const liveQuote = runtime.fn('live-quote', async (symbol: string, ctx): Promise<Quote> => {
    // Simulated upstream that is slower than the timeout allows.
    await sleep(500, ctx.signal);
    return { symbol, price: 101.5, source: 'live' };
  });
  const staleQuote = fromFunction('stale-quote', (symbol: string): Quote => ({ symbol, price: 99.0, source: 'stale' }));

  const quote = runtime
    .pipeline(liveQuote)
    .withTimeout({ timeoutMs: runtime.config.timeout.timeoutMs })
    .withRetry({ maxRetries: 1, baseDelayMs: 10, jitter: false })
    .withFallback(staleQuote)
    .build();

  const ctx = runtime.context({ workflowId: 'quote-lookup' });
  const result = await quote.execute('ACME', ctx);

  console.log('quote:', result);
  console.log('checkpoints:', ctx.checkpoints.map((checkpoint) => checkpoint.name).join(', '));
  console.log('timeouts:', sink.eventsNamed('timeout.expired').length);
  console.log(
    'failed live attempts:',
    sink.counter(METRIC_EXECUTIONS, { primitive: liveQuote.name, status: 'error' }),
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
