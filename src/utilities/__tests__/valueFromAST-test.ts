import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { GraphQLInputType } from 'graphql';
import {
  GraphQLBoolean,
  GraphQLEnumType,
  GraphQLFloat,
  GraphQLID,
  GraphQLInputObjectType,
  GraphQLInt,
  GraphQLList,
  GraphQLNonNull,
  GraphQLString,
  parseValue,
} from 'graphql';

import type { ObjMap } from '../../jsutils/ObjMap';

import { valueFromAST } from '../valueFromAST';

function expectValueFrom(
  valueText: string,
  type: GraphQLInputType,
  variables?: ObjMap<unknown>,
) {
  const ast = parseValue(valueText);
  const value = valueFromAST(ast, type, variables);
  return expect(value);
}

describe('valueFromAST', () => {
  it('rejects empty input', () => {
    expect(valueFromAST(null, GraphQLBoolean)).to.deep.equal(undefined);
  });

  it('converts according to input coercion rules', () => {
    expectValueFrom('true', GraphQLBoolean).to.equal(true);
    expectValueFrom('false', GraphQLBoolean).to.equal(false);
    expectValueFrom('123', GraphQLInt).to.equal(123);
    expectValueFrom('123', GraphQLFloat).to.equal(123);
    expectValueFrom('123.456', GraphQLFloat).to.equal(123.456);
    expectValueFrom('"abc123"', GraphQLString).to.equal('abc123');
    expectValueFrom('123456', GraphQLID).to.equal('123456');
    expectValueFrom('"123456"', GraphQLID).to.equal('123456');
  });

  it('does not convert when input coercion rules reject a value', () => {
    expectValueFrom('123', GraphQLBoolean).to.equal(undefined);
    expectValueFrom('123.456', GraphQLInt).to.equal(undefined);
    expectValueFrom('true', GraphQLInt).to.equal(undefined);
    expectValueFrom('"123"', GraphQLInt).to.equal(undefined);
    expectValueFrom('"123"', GraphQLFloat).to.equal(undefined);
    expectValueFrom('123', GraphQLString).to.equal(undefined);
  });

  it('converts enum values according to input coercion rules', () => {
    const testEnum = new GraphQLEnumType({
      name: 'TestColor',
      values: {
        RED: { value: 1 },
        GREEN: { value: 2 },
        BLUE: { value: 3 },
      },
    });

    expectValueFrom('RED', testEnum).to.equal(1);
    expectValueFrom('BLUE', testEnum).to.equal(3);
    expectValueFrom('3', testEnum).to.equal(undefined);
    expectValueFrom('"BLUE"', testEnum).to.equal(undefined);
    expectValueFrom('null', testEnum).to.equal(null);
  });

  const nonNullBool = new GraphQLNonNull(GraphQLBoolean);
  const listOfBool = new GraphQLList(GraphQLBoolean);
  const nonNullListOfNonNullBool = new GraphQLNonNull(
    new GraphQLList(nonNullBool),
  );

  it('coerces to null unless non-null', () => {
    expectValueFrom('null', GraphQLBoolean).to.equal(null);
    expectValueFrom('null', nonNullBool).to.equal(undefined);
  });

  it('coerces lists of values', () => {
    expectValueFrom('true', listOfBool).to.deep.equal([true]);
    expectValueFrom('123', listOfBool).to.equal(undefined);
    expectValueFrom('null', listOfBool).to.equal(null);
    expectValueFrom('[true, false]', listOfBool).to.deep.equal([true, false]);
    expectValueFrom('[true, 123]', listOfBool).to.equal(undefined);
    expectValueFrom('[true, null]', listOfBool).to.deep.equal([true, null]);
    expectValueFrom('[true, null]', nonNullListOfNonNullBool).to.equal(
      undefined,
    );
  });

  const testInputObj = new GraphQLInputObjectType({
    name: 'TestInput',
    fields: {
      int: { type: GraphQLInt, defaultValue: 42 },
      bool: { type: GraphQLBoolean },
      requiredBool: { type: nonNullBool },
      renamed: { type: GraphQLString, extensions: { outName: 'internal' } },
    },
  });

  it('coerces input objects according to input coercion rules', () => {
    expectValueFrom('null', testInputObj).to.equal(null);
    expectValueFrom('123', testInputObj).to.equal(undefined);
    expectValueFrom('[]', testInputObj).to.equal(undefined);
    expectValueFrom(
      '{ int: 123, requiredBool: false }',
      testInputObj,
    ).to.deep.equal({
      int: 123,
      requiredBool: false,
    });
    expectValueFrom(
      '{ bool: true, requiredBool: false }',
      testInputObj,
    ).to.deep.equal({
      int: 42,
      bool: true,
      requiredBool: false,
    });
    expectValueFrom(
      '{ int: true, requiredBool: true }',
      testInputObj,
    ).to.equal(undefined);
    expectValueFrom('{ requiredBool: null }', testInputObj).to.equal(undefined);
    expectValueFrom('{ bool: true }', testInputObj).to.equal(undefined);
  });

  it('stores input object fields under their configured outName', () => {
    expectValueFrom(
      '{ requiredBool: true, renamed: "value" }',
      testInputObj,
    ).to.deep.equal({
      int: 42,
      requiredBool: true,
      internal: 'value',
    });
  });

  it('accepts variable values assuming already coerced', () => {
    expectValueFrom('$var', GraphQLBoolean, {}).to.equal(undefined);
    expectValueFrom('$var', GraphQLBoolean, { var: true }).to.equal(true);
    expectValueFrom('$var', GraphQLBoolean, { var: null }).to.equal(null);
    expectValueFrom('$var', nonNullBool, { var: null }).to.equal(undefined);
  });

  it('asserts variables are provided as items in lists', () => {
    expectValueFrom('[ $foo ]', listOfBool, {}).to.deep.equal([null]);
    expectValueFrom('[ $foo ]', nonNullListOfNonNullBool, {}).to.equal(
      undefined,
    );
    expectValueFrom('[ $foo ]', nonNullListOfNonNullBool, {
      foo: true,
    }).to.deep.equal([true]);
  });

  it('omits input object fields for unprovided variables', () => {
    expectValueFrom(
      '{ int: $foo, bool: $foo, requiredBool: true }',
      testInputObj,
      {},
    ).to.deep.equal({ int: 42, requiredBool: true });

    expectValueFrom('{ requiredBool: $foo }', testInputObj, {}).to.equal(
      undefined,
    );
  });
});
