import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { DocumentNode } from 'graphql';
import {
  GraphQLID,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
  parse,
} from 'graphql';

import { expectJSON } from '../../__testUtils__/expectJSON';

import { experimentalExecuteIncrementally } from '../execute';

const friendType = new GraphQLObjectType({
  fields: {
    id: { type: GraphQLID },
    name: { type: GraphQLString },
  },
  name: 'Friend',
});

const friends = [
  { name: 'Han', id: 2 },
  { name: 'Leia', id: 3 },
  { name: 'C-3PO', id: 4 },
];

const heroType = new GraphQLObjectType({
  fields: {
    id: { type: GraphQLID },
    name: { type: GraphQLString },
    errorField: {
      type: GraphQLString,
      resolve: () => {
        throw new Error('bad');
      },
    },
    nonNullErrorField: {
      type: new GraphQLNonNull(GraphQLString),
      resolve: () => {
        throw new Error('bad');
      },
    },
    friends: {
      type: new GraphQLList(friendType),
      resolve: () => friends,
    },
  },
  name: 'Hero',
});

const hero = { name: 'Luke', id: 1 };

const query = new GraphQLObjectType({
  fields: {
    hero: {
      type: heroType,
      resolve: () => hero,
    },
  },
  name: 'Query',
});

const schema = new GraphQLSchema({ query });

async function complete(document: DocumentNode): Promise<unknown> {
  const result = await experimentalExecuteIncrementally({
    schema,
    document,
    rootValue: {},
  });

  if ('initialResult' in result) {
    const results: Array<unknown> = [result.initialResult];
    for await (const patch of result.subsequentResults) {
      results.push(patch);
    }
    return results;
  }
  return result;
}

describe('Execute: defer directive', () => {
  it('Can defer fragments containing scalar types', async () => {
    const document = parse(`
      query HeroNameQuery {
        hero {
          id
          ...NameFragment @defer
        }
      }
      fragment NameFragment on Hero {
        id
        name
      }
    `);
    const result = await complete(document);

    expect(result).to.deep.equal([
      {
        data: {
          hero: {
            id: '1',
          },
        },
        pending: [{ id: '0', path: ['hero'] }],
        hasNext: true,
      },
      {
        incremental: [
          {
            data: {
              name: 'Luke',
            },
            id: '0',
          },
        ],
        completed: [{ id: '0' }],
        hasNext: false,
      },
    ]);
  });

  it('Can disable defer using if argument', async () => {
    const document = parse(`
      query HeroNameQuery {
        hero {
          id
          ...NameFragment @defer(if: false)
        }
      }
      fragment NameFragment on Hero {
        name
      }
    `);
    const result = await complete(document);

    expect(result).to.deep.equal({
      data: {
        hero: {
          id: '1',
          name: 'Luke',
        },
      },
    });
  });

  it('Can defer fragments on the top level Query field', async () => {
    const document = parse(`
      query HeroNameQuery {
        ...QueryFragment @defer(label: "DeferQuery")
      }
      fragment QueryFragment on Query {
        hero {
          id
        }
      }
    `);
    const result = await complete(document);

    expect(result).to.deep.equal([
      {
        data: {},
        pending: [{ id: '0', path: [], label: 'DeferQuery' }],
        hasNext: true,
      },
      {
        incremental: [
          {
            data: {
              hero: {
                id: '1',
              },
            },
            id: '0',
          },
        ],
        completed: [{ id: '0' }],
        hasNext: false,
      },
    ]);
  });

  it('Can defer a fragment within an already deferred fragment', async () => {
    const document = parse(`
      query HeroNameQuery {
        hero {
          ... @defer {
            id
            ... @defer {
              name
            }
          }
        }
      }
    `);
    const result = await complete(document);

    expect(result).to.deep.equal([
      {
        data: {
          hero: {},
        },
        pending: [{ id: '0', path: ['hero'] }],
        hasNext: true,
      },
      {
        pending: [{ id: '1', path: ['hero'] }],
        incremental: [
          {
            data: { id: '1' },
            id: '0',
          },
          {
            data: { name: 'Luke' },
            id: '1',
          },
        ],
        completed: [{ id: '0' }, { id: '1' }],
        hasNext: false,
      },
    ]);
  });

  it('Delivers deferred data below the fragment path with a subPath', async () => {
    const document = parse(`
      query HeroNameQuery {
        hero {
          id
        }
        ... @defer {
          hero {
            name
          }
        }
      }
    `);
    const result = await complete(document);

    expect(result).to.deep.equal([
      {
        data: {
          hero: { id: '1' },
        },
        pending: [{ id: '0', path: [] }],
        hasNext: true,
      },
      {
        incremental: [
          {
            data: { name: 'Luke' },
            id: '0',
            subPath: ['hero'],
          },
        ],
        completed: [{ id: '0' }],
        hasNext: false,
      },
    ]);
  });

  it('Creates one deferred fragment per list item', async () => {
    const document = parse(`
      query HeroNameQuery {
        hero {
          friends {
            id
            ... @defer {
              name
            }
          }
        }
      }
    `);
    const result = await complete(document);

    expect(result).to.deep.equal([
      {
        data: {
          hero: {
            friends: [{ id: '2' }, { id: '3' }, { id: '4' }],
          },
        },
        pending: [
          { id: '0', path: ['hero', 'friends', 0] },
          { id: '1', path: ['hero', 'friends', 1] },
          { id: '2', path: ['hero', 'friends', 2] },
        ],
        hasNext: true,
      },
      {
        incremental: [
          { data: { name: 'Han' }, id: '0' },
          { data: { name: 'Leia' }, id: '1' },
          { data: { name: 'C-3PO' }, id: '2' },
        ],
        completed: [{ id: '0' }, { id: '1' }, { id: '2' }],
        hasNext: false,
      },
    ]);
  });

  it('Handles errors thrown in deferred fragments', async () => {
    const document = parse('{ hero { id ... @defer { errorField } } }');
    const result = await complete(document);

    expectJSON(result).toDeepEqual([
      {
        data: {
          hero: { id: '1' },
        },
        pending: [{ id: '0', path: ['hero'] }],
        hasNext: true,
      },
      {
        incremental: [
          {
            data: { errorField: null },
            errors: [
              {
                message: 'bad',
                locations: [{ line: 1, column: 26 }],
                path: ['hero', 'errorField'],
              },
            ],
            id: '0',
          },
        ],
        completed: [{ id: '0' }],
        hasNext: false,
      },
    ]);
  });

  it('Handles non-nullable errors thrown in deferred fragments', async () => {
    const document = parse('{ hero { id ... @defer { nonNullErrorField } } }');
    const result = await complete(document);

    expectJSON(result).toDeepEqual([
      {
        data: {
          hero: { id: '1' },
        },
        pending: [{ id: '0', path: ['hero'] }],
        hasNext: true,
      },
      {
        completed: [
          {
            id: '0',
            errors: [
              {
                message: 'bad',
                locations: [{ line: 1, column: 26 }],
                path: ['hero', 'nonNullErrorField'],
              },
            ],
          },
        ],
        hasNext: false,
      },
    ]);
  });

  it('Drops deferred fragments below a field nulled by an error', async () => {
    const document = parse(
      '{ hero { nonNullErrorField ... @defer { name } } }',
    );
    const result = await complete(document);

    expectJSON(result).toDeepEqual({
      data: { hero: null },
      errors: [
        {
          message: 'bad',
          locations: [{ line: 1, column: 10 }],
          path: ['hero', 'nonNullErrorField'],
        },
      ],
    });
  });

  it('Can be closed before all deferred data is sent', async () => {
    const document = parse('{ hero { id ... @defer { name } } }');
    const result = await experimentalExecuteIncrementally({
      schema,
      document,
    });

    if (!('initialResult' in result)) {
      expect.fail('expected incremental results');
    }

    const { subsequentResults } = result;
    expect(await subsequentResults.return()).to.deep.equal({
      value: undefined,
      done: true,
    });
    expect(await subsequentResults.next()).to.deep.equal({
      value: undefined,
      done: true,
    });
  });
});
