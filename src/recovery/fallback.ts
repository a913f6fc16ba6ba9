import type { WorkflowContext } from '../core/context.js';
import { ConfigurationError } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { emitEvent } from '../observability/instrumentation.js';
import { getErrorMessage } from '../utils/errors.js';

/**
 * Primary plus ordered alternatives. Only a raised error moves on to the
 * next alternative; a returned value, whatever it holds, is a success.
 * When every alternative fails the last one's error is re-raised.
 */
export class FallbackPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'fallback';

  constructor(
    private readonly primary: Primitive<TIn, TOut>,
    private readonly fallbacks: readonly Primitive<TIn, TOut>[],
    options: PrimitiveOptions = {},
  ) {
    if (fallbacks.length === 0) {
      throw new ConfigurationError(`Fallback for ${primary.name} requires at least one alternative`);
    }
    super(`Fallback(${[primary, ...fallbacks].map((p) => p.name).join(' -> ')})`, options);
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    try {
      return await this.primary.execute(input, ctx);
    } catch (primaryError) {
      this.logger.warn(`Fallback ${this.name}: primary ${this.primary.name} failed`, {
        error: getErrorMessage(primaryError),
        correlationId: ctx.correlationId,
      });
      let lastError: unknown = primaryError;
      for (const [index, alternative] of this.fallbacks.entries()) {
        emitEvent(this.instrumentation, 'fallback.triggered', ctx, {
          fallback: this.name,
          alternative: alternative.name,
          index,
          error: getErrorMessage(lastError),
        });
        try {
          return await alternative.execute(input, ctx);
        } catch (error) {
          lastError = error;
          this.logger.warn(`Fallback ${this.name}: alternative ${alternative.name} failed`, {
            error: getErrorMessage(error),
            correlationId: ctx.correlationId,
          });
        }
      }
      throw lastError;
    }
  }
}

export function withFallback<TIn, TOut>(
  primary: Primitive<TIn, TOut>,
  fallbacks: readonly Primitive<TIn, TOut>[],
  options: PrimitiveOptions = {},
): FallbackPrimitive<TIn, TOut> {
  return new FallbackPrimitive(primary, fallbacks, options);
}
