import { expect } from 'chai';
import { describe, it } from 'mocha';

import { AccumulatorMap } from '../AccumulatorMap';

describe('AccumulatorMap', () => {
  it('groups items by key in insertion order', () => {
    const map = new AccumulatorMap<string, number>();

    map.add('a', 1);
    map.add('b', 2);
    map.add('a', 3);

    expect([...map.entries()]).to.deep.equal([
      ['a', [1, 3]],
      ['b', [2]],
    ]);
  });
});
