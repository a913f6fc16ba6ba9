/**
 * @fileoverview Compensation (saga)
 *
 * Runs an ordered list of steps as a pipe. When a step fails, every step
 * that already succeeded is compensated in reverse order with the input and
 * output it saw. Compensation failures are logged and reported but never
 * raised: the caller always receives the original error.
 */

import type { WorkflowContext } from '../core/context.js';
import { ConfigurationError } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { emitEvent } from '../observability/instrumentation.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface StepRecord<TIn, TOut> {
  input: TIn;
  output: TOut;
}

export interface CompensatedStep<TIn, TOut> {
  step: Primitive<TIn, TOut>;
  compensate?: Primitive<StepRecord<TIn, TOut>, unknown>;
}

export type CompensationStatus = 'compensated' | 'failed' | 'skipped';

export interface CompensationOutcome {
  step: string;
  index: number;
  status: CompensationStatus;
  error?: string;
}

export interface CompensationReport {
  saga: string;
  correlationId: string;
  failedStep: string;
  failedIndex: number;
  error: string;
  /** Outcomes in the order compensations ran (reverse step order). */
  outcomes: CompensationOutcome[];
}

export interface CompensationOptions extends PrimitiveOptions {
  onReport?: (report: CompensationReport) => void;
}

interface CompletedStep {
  step: string;
  index: number;
  undo?: (ctx: WorkflowContext) => Promise<unknown>;
}

type SagaLink<TIn, TOut> = (input: TIn, ctx: WorkflowContext, journal: CompletedStep[]) => Promise<TOut>;

function stepLink<TIn, TOut>(entry: CompensatedStep<TIn, TOut>, index: number): SagaLink<TIn, TOut> {
  return async (input, ctx, journal) => {
    const output = await entry.step.execute(input, ctx);
    const { compensate } = entry;
    journal.push({
      step: entry.step.name,
      index,
      undo: compensate ? (undoCtx) => compensate.execute({ input, output }, undoCtx) : undefined,
    });
    return output;
  };
}

// ============================================================================
// PRIMITIVE
// ============================================================================

export class CompensationPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'compensation';

  private constructor(
    readonly stepNames: readonly string[],
    private readonly link: SagaLink<TIn, TOut>,
    private readonly options: CompensationOptions,
  ) {
    super(`Saga(${stepNames.join(' >> ')})`, options);
  }

  static start<TIn, TOut>(
    first: CompensatedStep<TIn, TOut>,
    options: CompensationOptions = {},
  ): CompensationPrimitive<TIn, TOut> {
    return new CompensationPrimitive([first.step.name], stepLink(first, 0), options);
  }

  static fromSteps(
    steps: readonly CompensatedStep<unknown, unknown>[],
    options: CompensationOptions = {},
  ): CompensationPrimitive<unknown, unknown> {
    const [first, ...rest] = steps;
    if (!first) {
      throw new ConfigurationError('Compensation requires at least one step');
    }
    let saga = CompensationPrimitive.start(first, options);
    for (const entry of rest) {
      saga = saga.then(entry.step, entry.compensate);
    }
    return saga;
  }

  then<TNext>(
    step: Primitive<TOut, TNext>,
    compensate?: Primitive<StepRecord<TOut, TNext>, unknown>,
  ): CompensationPrimitive<TIn, TNext> {
    const previous = this.link;
    const next = stepLink({ step, compensate }, this.stepNames.length);
    return new CompensationPrimitive<TIn, TNext>(
      [...this.stepNames, step.name],
      async (input, ctx, journal) => next(await previous(input, ctx, journal), ctx, journal),
      this.options,
    );
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    const journal: CompletedStep[] = [];
    try {
      return await this.link(input, ctx, journal);
    } catch (error) {
      const report = await this.compensate(journal, error, ctx);
      this.deliver(report, ctx);
      throw error;
    }
  }

  private async compensate(journal: readonly CompletedStep[], error: unknown, ctx: WorkflowContext): Promise<CompensationReport> {
    const failedIndex = journal.length;
    // Compensations must run even when the forward path was cancelled.
    const undoCtx = ctx.withSignal(new AbortController().signal);
    const outcomes: CompensationOutcome[] = [];

    for (const completed of [...journal].reverse()) {
      if (!completed.undo) {
        outcomes.push({ step: completed.step, index: completed.index, status: 'skipped' });
        continue;
      }
      try {
        await completed.undo(undoCtx);
        outcomes.push({ step: completed.step, index: completed.index, status: 'compensated' });
      } catch (undoError) {
        const message = getErrorMessage(undoError);
        this.logger.error(`Saga ${this.name}: compensation for ${completed.step} failed`, {
          error: message,
          correlationId: ctx.correlationId,
        });
        outcomes.push({ step: completed.step, index: completed.index, status: 'failed', error: message });
      }
    }

    return {
      saga: this.name,
      correlationId: ctx.correlationId,
      failedStep: this.stepNames[failedIndex] ?? 'unknown',
      failedIndex,
      error: getErrorMessage(error),
      outcomes,
    };
  }

  private deliver(report: CompensationReport, ctx: WorkflowContext): void {
    emitEvent(this.instrumentation, 'compensation.report', ctx, {
      saga: report.saga,
      failedStep: report.failedStep,
      compensated: report.outcomes.filter((o) => o.status === 'compensated').length,
      failed: report.outcomes.filter((o) => o.status === 'failed').length,
    });
    if (!this.options.onReport) return;
    try {
      this.options.onReport(report);
    } catch (error) {
      this.logger.debug(`Saga ${this.name}: onReport callback failed`, { error: getErrorMessage(error) });
    }
  }
}

// ============================================================================
// FACTORIES
// ============================================================================

export function compensation(
  steps: readonly CompensatedStep<unknown, unknown>[],
  options: CompensationOptions = {},
): CompensationPrimitive<unknown, unknown> {
  return CompensationPrimitive.fromSteps(steps, options);
}

/** Single forward action with its compensating action. */
export function saga<TIn, TOut>(
  forward: Primitive<TIn, TOut>,
  compensate: Primitive<StepRecord<TIn, TOut>, unknown>,
  options: CompensationOptions = {},
): CompensationPrimitive<TIn, TOut> {
  return CompensationPrimitive.start({ step: forward, compensate }, options);
}
