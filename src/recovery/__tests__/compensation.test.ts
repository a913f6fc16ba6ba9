import { describe, expect, it, vi } from 'vitest';
import { CompensationPrimitive, compensation, saga, type CompensationReport, type StepRecord } from '../compensation.js';
import { createContext } from '../../core/context.js';
import { ConfigurationError } from '../../core/errors.js';
import { fromFunction } from '../../core/primitive.js';
import { InMemorySink } from '../../observability/in_memory_sink.js';
import { silentLogger } from '../../telemetry/logger.js';

function recorder(name: string, log: string[]) {
  return fromFunction(`undo-${name}`, (record: StepRecord<number, number>) => {
    log.push(`${name} ${record.input}->${record.output}`);
  });
}

describe('Compensation', () => {
  it('undoes completed steps in reverse order and re-raises the original error', async () => {
    const undone: string[] = [];
    const reports: CompensationReport[] = [];
    const sink = new InMemorySink(() => 0);
    const shipError = new Error('carrier down');

    const order = CompensationPrimitive.start(
      { step: fromFunction('reserve', (n: number) => n + 1), compensate: recorder('reserve', undone) },
      { sink, logger: silentLogger, onReport: (report) => reports.push(report) },
    )
      .then(fromFunction('charge', (n: number) => n * 10), recorder('charge', undone))
      .then(
        fromFunction('ship', (_n: number): string => {
          throw shipError;
        }),
      );

    expect(order.name).toBe('Saga(reserve >> charge >> ship)');
    await expect(order.execute(1, createContext({ correlationId: 'order-1' }))).rejects.toBe(shipError);

    expect(undone).toEqual(['charge 2->20', 'reserve 1->2']);
    expect(reports).toEqual([
      {
        saga: 'Saga(reserve >> charge >> ship)',
        correlationId: 'order-1',
        failedStep: 'ship',
        failedIndex: 2,
        error: 'carrier down',
        outcomes: [
          { step: 'charge', index: 1, status: 'compensated' },
          { step: 'reserve', index: 0, status: 'compensated' },
        ],
      },
    ]);
    expect(sink.eventsNamed('compensation.report')[0]?.attributes).toMatchObject({ compensated: 2, failed: 0 });
  });

  it('reports skipped and failed compensations without raising them', async () => {
    const onReport = vi.fn();
    const flow = compensation(
      [
        { step: fromFunction('a', (n: unknown) => n) },
        {
          step: fromFunction('b', (n: unknown) => n),
          compensate: fromFunction('undo-b', (): void => {
            throw new Error('undo b broke');
          }),
        },
        {
          step: fromFunction('c', (): unknown => {
            throw new Error('c failed');
          }),
        },
      ],
      { logger: silentLogger, onReport },
    );

    await expect(flow.execute(5)).rejects.toThrow('c failed');
    expect(onReport).toHaveBeenCalledTimes(1);
    expect(onReport.mock.calls[0]?.[0]).toMatchObject({
      failedStep: 'c',
      failedIndex: 2,
      outcomes: [
        { step: 'b', index: 1, status: 'failed', error: 'undo b broke' },
        { step: 'a', index: 0, status: 'skipped' },
      ],
    });
  });

  it('runs compensations with a live signal after cancellation', async () => {
    const controller = new AbortController();
    let undoSignalAborted: boolean | undefined;
    const flow = saga(
      fromFunction('book', (n: number) => n),
      fromFunction('unbook', (_record: StepRecord<number, number>, ctx) => {
        undoSignalAborted = ctx.signal?.aborted;
      }),
      { logger: silentLogger },
    ).then(
      fromFunction('pay', (_n: number): number => {
        controller.abort();
        throw new Error('cancelled mid-flight');
      }),
    );

    await expect(flow.execute(1, createContext({ signal: controller.signal }))).rejects.toThrow('cancelled mid-flight');
    expect(undoSignalAborted).toBe(false);
  });

  it('does nothing extra on success', async () => {
    const onReport = vi.fn();
    const undone: string[] = [];
    const flow = saga(fromFunction('reserve', (n: number) => n + 1), recorder('reserve', undone), { onReport });
    expect(await flow.execute(1)).toBe(2);
    expect(undone).toEqual([]);
    expect(onReport).not.toHaveBeenCalled();
  });

  it('requires at least one step', () => {
    expect(() => compensation([])).toThrow(ConfigurationError);
  });
});
