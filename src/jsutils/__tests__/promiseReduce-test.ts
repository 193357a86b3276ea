import { expect } from 'chai';
import { describe, it } from 'mocha';

import { isPromise } from '../isPromise';
import { promiseReduce } from '../promiseReduce';

describe('promiseReduce', () => {
  it('reduces synchronously when no callback returns a promise', () => {
    const result = promiseReduce(
      [1, 2, 3],
      (sum: number, value: number) => sum + value,
      0,
    );

    expect(result).to.equal(6);
  });

  it('waits for each promise before continuing', async () => {
    const visited: Array<number> = [];
    const result = promiseReduce(
      [1, 2, 3],
      (sum: number, value: number) => {
        visited.push(value);
        return value === 2 ? Promise.resolve(sum + value) : sum + value;
      },
      0,
    );

    expect(isPromise(result)).to.equal(true);
    expect(visited).to.deep.equal([1, 2]);
    expect(await result).to.equal(6);
    expect(visited).to.deep.equal([1, 2, 3]);
  });

  it('accepts a promise as the initial value', async () => {
    const result = promiseReduce(
      ['b', 'c'],
      (text: string, value: string) => text + value,
      Promise.resolve('a'),
    );

    expect(await result).to.equal('abc');
  });
});
