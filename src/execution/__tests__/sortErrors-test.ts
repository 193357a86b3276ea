import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { SelectionNode } from 'graphql';
import { GraphQLError, Kind, parse } from 'graphql';

import { sortErrors } from '../sortErrors';

function parseSelections(source: string): ReadonlyArray<SelectionNode> {
  const definition = parse(source).definitions[0];
  if (definition.kind !== Kind.OPERATION_DEFINITION) {
    expect.fail('expected an operation');
  }
  return definition.selectionSet.selections;
}

const [aNode, bNode] = parseSelections('{ a b { c } }');

function messages(errors: ReadonlyArray<GraphQLError>): Array<string> {
  return errors.map((error) => error.message);
}

describe('sortErrors', () => {
  it('sorts errors by location', () => {
    const late = new GraphQLError('late', { nodes: bNode });
    const early = new GraphQLError('early', { nodes: aNode });

    expect(messages(sortErrors([late, early]))).to.deep.equal([
      'early',
      'late',
    ]);
  });

  it('sorts errors without locations first', () => {
    const located = new GraphQLError('located', { nodes: aNode });
    const unlocated = new GraphQLError('unlocated');

    expect(messages(sortErrors([located, unlocated]))).to.deep.equal([
      'unlocated',
      'located',
    ]);
  });

  it('sorts errors at the same location by path', () => {
    const second = new GraphQLError('z second', {
      nodes: aNode,
      path: ['a', 1],
    });
    const first = new GraphQLError('y first', { nodes: aNode, path: ['a', 0] });
    const parent = new GraphQLError('x parent', { nodes: aNode, path: ['a'] });

    expect(messages(sortErrors([second, first, parent]))).to.deep.equal([
      'x parent',
      'y first',
      'z second',
    ]);
  });

  it('sorts list indices before field names', () => {
    const named = new GraphQLError('a named', { path: ['a', 'b'] });
    const indexed = new GraphQLError('b indexed', { path: ['a', 0] });

    expect(messages(sortErrors([named, indexed]))).to.deep.equal([
      'b indexed',
      'a named',
    ]);
  });

  it('sorts errors at the same location and path by message', () => {
    const b = new GraphQLError('b', { nodes: aNode });
    const a = new GraphQLError('a', { nodes: aNode });

    expect(messages(sortErrors([b, a]))).to.deep.equal(['a', 'b']);
  });

  it('does not modify the given array', () => {
    const late = new GraphQLError('late', { nodes: bNode });
    const early = new GraphQLError('early', { nodes: aNode });
    const errors = [late, early];

    const sorted = sortErrors(errors);

    expect(sorted).to.not.equal(errors);
    expect(messages(errors)).to.deep.equal(['late', 'early']);
  });
});
