/**
 * @fileoverview Sequential composition
 *
 * Steps run strictly left to right; each step's output is the next step's
 * input and all steps share one context instance. The first failure stops
 * the chain and propagates unchanged.
 *
 * Chaining a Sequential into another flattens both into one ordered list, so
 * `(a >> b) >> c` and `a >> (b >> c)` are the same three-step pipeline.
 */

import type { WorkflowContext } from '../core/context.js';
import { ConfigurationError } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { emitEvent } from '../observability/instrumentation.js';
import { throwIfAborted } from '../utils/async.js';

type StepListener = (index: number, step: Primitive<never, unknown>, ctx: WorkflowContext) => void;

/**
 * A typed link of the chain. `offset` is the absolute index of the link's
 * first step inside the flattened list.
 */
type Link<TIn, TOut> = (input: TIn, ctx: WorkflowContext, offset: number, onStep: StepListener) => Promise<TOut>;

function singleLink<TIn, TOut>(step: Primitive<TIn, TOut>): Link<TIn, TOut> {
  return (input, ctx, offset, onStep) => {
    onStep(offset, step, ctx);
    return step.execute(input, ctx);
  };
}

function joinLinks<A, B, C>(left: Link<A, B>, leftLength: number, right: Link<B, C>): Link<A, C> {
  return async (input, ctx, offset, onStep) => {
    const middle = await left(input, ctx, offset, onStep);
    return right(middle, ctx, offset + leftLength, onStep);
  };
}

function defaultName(steps: readonly Primitive<never, unknown>[]): string {
  return `Sequential(${steps.map((s) => s.name).join(' >> ')})`;
}

export class SequentialPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'sequential';

  private constructor(
    readonly steps: readonly Primitive<never, unknown>[],
    private readonly link: Link<TIn, TOut>,
    private readonly options: PrimitiveOptions,
  ) {
    super(defaultName(steps), options);
  }

  /** Start a chain from its first step. */
  static start<TIn, TOut>(first: Primitive<TIn, TOut>, options: PrimitiveOptions = {}): SequentialPrimitive<TIn, TOut> {
    if (first instanceof SequentialPrimitive) {
      return new SequentialPrimitive<TIn, TOut>(first.steps, first.link, options);
    }
    return new SequentialPrimitive([first], singleLink(first), options);
  }

  /**
   * Untyped construction from a list. An empty list is a configuration
   * error.
   */
  static fromSteps(
    steps: readonly Primitive<unknown, unknown>[],
    options: PrimitiveOptions = {},
  ): SequentialPrimitive<unknown, unknown> {
    const [first, ...rest] = steps;
    if (!first) {
      throw new ConfigurationError('Sequential requires at least one step');
    }
    let chain = SequentialPrimitive.start(first, options);
    for (const step of rest) {
      chain = chain.then(step);
    }
    return chain;
  }

  /** Append a step (flattening a nested Sequential). */
  then<TNext>(next: Primitive<TOut, TNext>): SequentialPrimitive<TIn, TNext> {
    const nextSteps = next instanceof SequentialPrimitive ? next.steps : [next];
    const nextLink: Link<TOut, TNext> = next instanceof SequentialPrimitive ? next.link : singleLink(next);
    return new SequentialPrimitive(
      [...this.steps, ...nextSteps],
      joinLinks(this.link, this.steps.length, nextLink),
      this.options,
    );
  }

  protected run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    return this.link(input, ctx, 0, (index, step, stepCtx) => {
      throwIfAborted(stepCtx.signal, this.name);
      emitEvent(this.instrumentation, 'sequential.step', stepCtx, {
        sequential: this.name,
        index,
        step: step.name,
      });
    });
  }
}

// ============================================================================
// FACTORIES
// ============================================================================

export function sequenceOf<A, B>(p1: Primitive<A, B>): SequentialPrimitive<A, B>;
export function sequenceOf<A, B, C>(p1: Primitive<A, B>, p2: Primitive<B, C>): SequentialPrimitive<A, C>;
export function sequenceOf<A, B, C, D>(
  p1: Primitive<A, B>,
  p2: Primitive<B, C>,
  p3: Primitive<C, D>,
): SequentialPrimitive<A, D>;
export function sequenceOf<A, B, C, D, E>(
  p1: Primitive<A, B>,
  p2: Primitive<B, C>,
  p3: Primitive<C, D>,
  p4: Primitive<D, E>,
): SequentialPrimitive<A, E>;
export function sequenceOf<A, B, C, D, E, F>(
  p1: Primitive<A, B>,
  p2: Primitive<B, C>,
  p3: Primitive<C, D>,
  p4: Primitive<D, E>,
  p5: Primitive<E, F>,
): SequentialPrimitive<A, F>;
export function sequenceOf(...steps: Primitive<unknown, unknown>[]): SequentialPrimitive<unknown, unknown>;
export function sequenceOf(...steps: Primitive<unknown, unknown>[]): SequentialPrimitive<unknown, unknown> {
  return SequentialPrimitive.fromSteps(steps);
}
