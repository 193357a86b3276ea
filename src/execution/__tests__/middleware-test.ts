import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { GraphQLFieldResolver } from 'graphql';
import {
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
  parse,
} from 'graphql';

import { executeSync } from '../execute';
import type { MiddlewareFn } from '../middleware';
import { MiddlewareManager } from '../middleware';

const schema = new GraphQLSchema({
  query: new GraphQLObjectType({
    name: 'Query',
    fields: {
      greeting: {
        type: GraphQLString,
        resolve: () => 'hello',
      },
      name: { type: GraphQLString },
    },
  }),
});

function loggingMiddleware(name: string, log: Array<string>): MiddlewareFn {
  return (next, source, args, contextValue, info) => {
    log.push(`${name} before`);
    const result = next(source, args, contextValue, info);
    log.push(`${name} after`);
    return result;
  };
}

const upperCase: MiddlewareFn = (next, source, args, contextValue, info) => {
  const result = next(source, args, contextValue, info);
  return typeof result === 'string' ? result.toUpperCase() : result;
};

describe('MiddlewareManager', () => {
  it('returns the resolver unchanged without middleware', () => {
    const resolver: GraphQLFieldResolver<unknown, unknown> = () => 'value';
    const manager = new MiddlewareManager();

    expect(manager.getFieldResolver(resolver)).to.equal(resolver);
  });

  it('caches the wrapped resolver', () => {
    const resolver: GraphQLFieldResolver<unknown, unknown> = () => 'value';
    const manager = new MiddlewareManager(upperCase);

    const wrapped = manager.getFieldResolver(resolver);

    expect(wrapped).to.not.equal(resolver);
    expect(manager.getFieldResolver(resolver)).to.equal(wrapped);
  });

  it('runs the last middleware outermost', () => {
    const log: Array<string> = [];
    const result = executeSync({
      schema,
      document: parse('{ greeting }'),
      middleware: [
        loggingMiddleware('first', log),
        loggingMiddleware('second', log),
      ],
    });

    expect(result).to.deep.equal({ data: { greeting: 'hello' } });
    expect(log).to.deep.equal([
      'second before',
      'first before',
      'first after',
      'second after',
    ]);
  });

  it('accepts middleware objects', () => {
    const result = executeSync({
      schema,
      document: parse('{ greeting }'),
      middleware: [{ resolve: upperCase }],
    });

    expect(result).to.deep.equal({ data: { greeting: 'HELLO' } });
  });

  it('wraps the default field resolver', () => {
    const result = executeSync({
      schema,
      document: parse('{ name }'),
      rootValue: { name: 'root' },
      middleware: new MiddlewareManager(upperCase),
    });

    expect(result).to.deep.equal({ data: { name: 'ROOT' } });
  });
});
