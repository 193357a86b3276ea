import { expect } from 'chai';
import { describe, it } from 'mocha';

import { memoize2 } from '../memoize2';

describe('memoize2', () => {
  it('memoizes simple functions', () => {
    let callCount = 0;
    const memoized = memoize2((a: object, b: object) => {
      callCount++;
      return { a, b };
    });

    const a1 = {};
    const a2 = {};
    const b1 = {};

    const result = memoized(a1, b1);
    expect(memoized(a1, b1)).to.equal(result);
    expect(callCount).to.equal(1);

    expect(memoized(a2, b1)).to.not.equal(result);
    expect(callCount).to.equal(2);
  });

  it('distinguishes the order of arguments', () => {
    const memoized = memoize2((a: object, b: object) => [a, b]);

    const x = {};
    const y = {};

    expect(memoized(x, y)).to.not.equal(memoized(y, x));
  });
});
