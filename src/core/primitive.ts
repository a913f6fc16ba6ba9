/**
 * @fileoverview Primitive contract
 *
 * A primitive is a named async unit of work `(input, ctx) -> output`. Leaves
 * wrap a function or external call, combinators own an ordered list of
 * children, decorators own exactly one child and add one behaviour.
 *
 * All built-in primitives extend BasePrimitive, whose `execute` applies
 * node-boundary instrumentation around the subclass's `run`.
 */

import { defaultLogger, type Logger } from '../telemetry/logger.js';
import { observe, type Instrumentation, type InstrumentationHooks } from '../observability/instrumentation.js';
import { NOOP_SINK, type ObservabilitySink } from '../observability/sink.js';
import { systemClock, type Clock } from './clock.js';
import { createContext, type WorkflowContext } from './context.js';

// ============================================================================
// CONTRACT
// ============================================================================

export interface Primitive<TIn, TOut> {
  readonly name: string;
  /**
   * Run the unit of work. Without a context a fresh one (with a new
   * correlation id) is created for this invocation.
   */
  execute(input: TIn, ctx?: WorkflowContext): Promise<TOut>;
}

export type PrimitiveFn<TIn, TOut> = (input: TIn, ctx: WorkflowContext) => TOut | Promise<TOut>;

/**
 * Dependencies every built-in primitive accepts. Each instance owns what it
 * was given; defaults are stateless.
 */
export interface PrimitiveOptions {
  name?: string;
  sink?: ObservabilitySink;
  logger?: Logger;
  clock?: Clock;
  hooks?: InstrumentationHooks;
}

// ============================================================================
// BASE
// ============================================================================

export abstract class BasePrimitive<TIn, TOut> implements Primitive<TIn, TOut> {
  readonly name: string;
  protected readonly sink: ObservabilitySink;
  protected readonly logger: Logger;
  protected readonly clock: Clock;
  private readonly hooks?: InstrumentationHooks;

  /** Short category recorded on spans and hook events. */
  protected abstract readonly kind: string;

  protected constructor(defaultName: string, options: PrimitiveOptions = {}) {
    this.name = options.name ?? defaultName;
    this.sink = options.sink ?? NOOP_SINK;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? systemClock;
    this.hooks = options.hooks;
  }

  execute(input: TIn, ctx?: WorkflowContext): Promise<TOut> {
    const context = ctx ?? createContext({ now: () => this.clock.now() });
    return observe(this.name, this.kind, input, context, this.instrumentation, () => this.run(input, context));
  }

  protected get instrumentation(): Instrumentation {
    return { sink: this.sink, logger: this.logger, clock: this.clock, hooks: this.hooks };
  }

  /** Shared dependencies to hand to primitives built on this one's behalf. */
  protected get inherited(): Omit<PrimitiveOptions, 'name' | 'hooks'> {
    return { sink: this.sink, logger: this.logger, clock: this.clock };
  }

  protected abstract run(input: TIn, ctx: WorkflowContext): Promise<TOut>;
}

// ============================================================================
// LEAVES
// ============================================================================

export class FunctionPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'leaf';

  constructor(
    name: string,
    private readonly fn: PrimitiveFn<TIn, TOut>,
    options: Omit<PrimitiveOptions, 'name'> = {},
  ) {
    super(name, options);
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    return this.fn(input, ctx);
  }
}

/**
 * Lift a plain sync or async function into a primitive.
 *
 * @example
 * ```typescript
 * const parse = fromFunction('parse', (text: string) => Number.parseInt(text, 10));
 * ```
 */
export function fromFunction<TIn, TOut>(
  name: string,
  fn: PrimitiveFn<TIn, TOut>,
  options: Omit<PrimitiveOptions, 'name'> = {},
): FunctionPrimitive<TIn, TOut> {
  return new FunctionPrimitive(name, fn, options);
}

/**
 * Give a foreign primitive (one not built on BasePrimitive) the same
 * boundary instrumentation as the built-in ones.
 */
export class InstrumentedPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'instrumented';

  constructor(
    private readonly inner: Primitive<TIn, TOut>,
    options: PrimitiveOptions = {},
  ) {
    super(inner.name, options);
  }

  protected run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    return this.inner.execute(input, ctx);
  }
}

export function instrument<TIn, TOut>(
  primitive: Primitive<TIn, TOut>,
  options: PrimitiveOptions = {},
): InstrumentedPrimitive<TIn, TOut> {
  return new InstrumentedPrimitive(primitive, options);
}
