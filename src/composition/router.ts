/**
 * @fileoverview Router
 *
 * A deterministic selector picks one named route per invocation; exactly
 * one child runs. Unmatched keys go to the default route when one is
 * configured, otherwise the call fails with RoutingError.
 */

import type { WorkflowContext } from '../core/context.js';
import { ConfigurationError, RoutingError } from '../core/errors.js';
import { BasePrimitive, type Primitive, type PrimitiveOptions } from '../core/primitive.js';
import { countMetric, emitEvent } from '../observability/instrumentation.js';
import { METRIC_ROUTER_DECISIONS } from '../observability/sink.js';
import { getErrorMessage, toError } from '../utils/errors.js';

export type RouteSelector<TIn> = (input: TIn, ctx: WorkflowContext) => string;

export type RouteReason = 'matched' | 'default' | 'selector_error';

export interface RouterOptions<TIn, TOut> extends PrimitiveOptions {
  routes: Record<string, Primitive<TIn, TOut>>;
  select: RouteSelector<TIn>;
  /** Route used when the selector returns an unknown key or throws. */
  defaultRoute?: string;
}

export interface RouteDecision {
  route: string;
  reason: RouteReason;
}

export class RouterPrimitive<TIn, TOut> extends BasePrimitive<TIn, TOut> {
  protected readonly kind = 'router';
  private readonly routes: ReadonlyMap<string, Primitive<TIn, TOut>>;
  private readonly select: RouteSelector<TIn>;
  private readonly defaultRoute?: string;

  constructor(options: RouterOptions<TIn, TOut>) {
    const keys = Object.keys(options.routes);
    if (keys.length === 0) {
      throw new ConfigurationError('Router requires at least one route');
    }
    if (options.defaultRoute !== undefined && !keys.includes(options.defaultRoute)) {
      throw new ConfigurationError(`Router default route '${options.defaultRoute}' is not a configured route`, [
        `available: ${keys.join(', ')}`,
      ]);
    }
    super(`Router(${keys.join('|')})`, options);
    this.routes = new Map(Object.entries(options.routes));
    this.select = options.select;
    this.defaultRoute = options.defaultRoute;
  }

  get routeKeys(): string[] {
    return Array.from(this.routes.keys());
  }

  /** Resolve which route an input would take, without running it. */
  decide(input: TIn, ctx: WorkflowContext): RouteDecision {
    let key: string;
    try {
      key = this.select(input, ctx);
    } catch (error) {
      if (this.defaultRoute === undefined) {
        throw new RoutingError(this.name, undefined, this.routeKeys, toError(error));
      }
      this.logger.warn(`Router ${this.name} selector failed; using default route '${this.defaultRoute}'`, {
        error: getErrorMessage(error),
        correlationId: ctx.correlationId,
      });
      return { route: this.defaultRoute, reason: 'selector_error' };
    }

    if (this.routes.has(key)) {
      return { route: key, reason: 'matched' };
    }
    if (this.defaultRoute !== undefined) {
      return { route: this.defaultRoute, reason: 'default' };
    }
    throw new RoutingError(this.name, key, this.routeKeys);
  }

  protected async run(input: TIn, ctx: WorkflowContext): Promise<TOut> {
    const decision = this.decide(input, ctx);
    const route = this.routes.get(decision.route);
    if (!route) {
      throw new RoutingError(this.name, decision.route, this.routeKeys);
    }
    countMetric(this.instrumentation, METRIC_ROUTER_DECISIONS, { route: decision.route, reason: decision.reason });
    emitEvent(this.instrumentation, 'router.decision', ctx, { router: this.name, ...decision });
    return route.execute(input, ctx);
  }
}

export function router<TIn, TOut>(options: RouterOptions<TIn, TOut>): RouterPrimitive<TIn, TOut> {
  return new RouterPrimitive(options);
}
