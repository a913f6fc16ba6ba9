import type { WorkflowContext } from '../core/context.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { emitEvent } from '../observability/instrumentation.js';

export type Predicate<TIn> = (input: TIn, ctx: WorkflowContext) => boolean | Promise<boolean>;

export interface ConditionalOptions<TIn, TOut> extends PrimitiveOptions {
  predicate: Predicate<TIn>;
  ifTrue: Primitive<TIn, TOut>;
  ifFalse: Primitive<TIn, TOut>;
}

/**
 * Two-way router: the predicate picks `ifTrue` or `ifFalse`. A throwing
 * predicate fails the call.
 */
export class ConditionalPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'conditional';
  private readonly predicate: Predicate<TIn>;
  private readonly ifTrue: Primitive<TIn, TOut>;
  private readonly ifFalse: Primitive<TIn, TOut>;

  constructor(options: ConditionalOptions<TIn, TOut>) {
    super(`Conditional(${options.ifTrue.name} | ${options.ifFalse.name})`, options);
    this.predicate = options.predicate;
    this.ifTrue = options.ifTrue;
    this.ifFalse = options.ifFalse;
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    const matched = await this.predicate(input, ctx);
    const branch = matched ? this.ifTrue : this.ifFalse;
    emitEvent(this.instrumentation, 'conditional.branch', ctx, {
      conditional: this.name,
      matched,
      branch: branch.name,
    });
    return branch.execute(input, ctx);
  }
}

export function when<TIn, TOut>(
  predicate: Predicate<TIn>,
  ifTrue: Primitive<TIn, TOut>,
  ifFalse: Primitive<TIn, TOut>,
  options: PrimitiveOptions = {},
): ConditionalPrimitive<TIn, TOut> {
  return new ConditionalPrimitive({ ...options, predicate, ifTrue, ifFalse });
}
