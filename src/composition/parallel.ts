/**
 * @fileoverview Parallel composition
 *
 * Every branch receives the same input and its own child context, and all
 * branches run concurrently. Outputs come back in branch order regardless
 * of completion order.
 *
 * Fail-fast (default): the first failure aborts the shared branch signal and
 * is re-raised. Settled: every branch runs to completion and the output is
 * one BranchOutcome per branch.
 */

import type { WorkflowContext } from '../core/context.js';
import { ConfigurationError } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { safeAsync, type BranchOutcome } from '../core/result.js';
import { linkAbort } from '../utils/async.js';

function requireBranches<T>(branches: readonly T[]): void {
  if (branches.length === 0) {
    throw new ConfigurationError('Parallel requires at least one branch');
  }
}

function defaultName(branches: readonly Primitive<never, unknown>[]): string {
  return `Parallel(${branches.map((b) => b.name).join(', ')})`;
}

// ============================================================================
// FAIL-FAST
// ============================================================================

export class ParallelPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut[]> {
  protected readonly kind = 'parallel';

  constructor(
    readonly branches: readonly Primitive<TIn, TOut>[],
    options: PrimitiveOptions = {},
  ) {
    requireBranches(branches);
    super(defaultName(branches), options);
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut[]> {
    const controller = new AbortController();
    const unlink = linkAbort(ctx.signal, controller);
    try {
      return await Promise.all(
        this.branches.map(async (branch) => {
          try {
            return await branch.execute(input, ctx.createChild({ signal: controller.signal }));
          } catch (error) {
            if (!controller.signal.aborted) {
              controller.abort(error);
            }
            throw error;
          }
        }),
      );
    } finally {
      unlink();
    }
  }
}

// ============================================================================
// SETTLED
// ============================================================================

export class ParallelSettledPrimitive<TIn, TOut> extends BasePrimitive<TIn, BranchOutcome<TOut>[]> {
  protected readonly kind = 'parallel';

  constructor(
    readonly branches: readonly Primitive<TIn, TOut>[],
    options: PrimitiveOptions = {},
  ) {
    requireBranches(branches);
    super(defaultName(branches), options);
  }

  protected run(input: TIn, ctx: WorkflowContext): Promise<BranchOutcome<TOut>[]> {
    return Promise.all(this.branches.map((branch) => safeAsync(() => branch.execute(input, ctx.createChild()))));
  }
}

// ============================================================================
// FACTORIES
// ============================================================================

export interface ParallelOptions extends PrimitiveOptions {
  /** Abort remaining branches and re-raise on the first failure. Default: true */
  failFast?: boolean;
}

export function parallel<TIn, TOut>(
  branches: readonly Primitive<TIn, TOut>[],
  options: ParallelOptions & { failFast: false },
): ParallelSettledPrimitive<TIn, TOut>;
export function parallel<TIn, TOut>(
  branches: readonly Primitive<TIn, TOut>[],
  options?: ParallelOptions & { failFast?: true },
): ParallelPrimitive<TIn, TOut>;
export function parallel<TIn, TOut>(
  branches: readonly Primitive<TIn, TOut>[],
  options: ParallelOptions = {},
): ParallelPrimitive<TIn, TOut> | ParallelSettledPrimitive<TIn, TOut> {
  const { failFast = true, ...rest } = options;
  return failFast ? new ParallelPrimitive(branches, rest) : new ParallelSettledPrimitive(branches, rest);
}

export function parallelOf<TIn, TOut>(...branches: Primitive<TIn, TOut>[]): ParallelPrimitive<TIn, TOut> {
  return new ParallelPrimitive(branches);
}
