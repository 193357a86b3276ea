import type { GraphQLFieldResolver, GraphQLResolveInfo } from 'graphql';

export type MiddlewareFn = (
  next: GraphQLFieldResolver<unknown, unknown>,
  source: unknown,
  args: { [argument: string]: unknown },
  contextValue: unknown,
  info: GraphQLResolveInfo,
) => unknown;

export interface MiddlewareObject {
  resolve: MiddlewareFn;
}

export type Middleware = MiddlewareFn | MiddlewareObject;

/**
 * Wraps field resolvers with a chain of middleware.
 *
 * Each middleware receives the next resolver in the chain as its first
 * argument. Middleware given as an object contributes its `resolve` method.
 * The last middleware given is the outermost one.
 */
export class MiddlewareManager {
  readonly middlewares: ReadonlyArray<Middleware>;
  private _middlewareResolvers: ReadonlyArray<MiddlewareFn> | undefined;
  private _cachedResolvers: WeakMap<
    GraphQLFieldResolver<unknown, unknown>,
    GraphQLFieldResolver<unknown, unknown>
  >;

  constructor(...middlewares: ReadonlyArray<Middleware>) {
    this.middlewares = middlewares;
    this._middlewareResolvers =
      middlewares.length > 0 ? middlewares.map(toMiddlewareFn) : undefined;
    this._cachedResolvers = new WeakMap();
  }

  /**
   * Returns the resolver wrapped by the middleware chain, or the resolver
   * itself when there is no middleware.
   */
  getFieldResolver(
    fieldResolver: GraphQLFieldResolver<unknown, unknown>,
  ): GraphQLFieldResolver<unknown, unknown> {
    if (this._middlewareResolvers === undefined) {
      return fieldResolver;
    }

    let wrapped = this._cachedResolvers.get(fieldResolver);
    if (wrapped === undefined) {
      wrapped = middlewareChain(fieldResolver, this._middlewareResolvers);
      this._cachedResolvers.set(fieldResolver, wrapped);
    }
    return wrapped;
  }
}

function toMiddlewareFn(middleware: Middleware): MiddlewareFn {
  if (typeof middleware === 'function') {
    return middleware;
  }
  return (next, source, args, contextValue, info) =>
    middleware.resolve(next, source, args, contextValue, info);
}

function middlewareChain(
  fieldResolver: GraphQLFieldResolver<unknown, unknown>,
  middlewareResolvers: ReadonlyArray<MiddlewareFn>,
): GraphQLFieldResolver<unknown, unknown> {
  let next = fieldResolver;
  for (const middlewareResolver of middlewareResolvers) {
    const inner = next;
    next = (source, args, contextValue, info) =>
      middlewareResolver(inner, source, args, contextValue, info);
  }
  return next;
}
