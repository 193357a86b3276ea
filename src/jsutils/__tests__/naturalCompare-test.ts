import { expect } from 'chai';
import { describe, it } from 'mocha';

import { naturalCompare } from '../naturalCompare';

describe('naturalCompare', () => {
  it('handles empty strings', () => {
    expect(naturalCompare('', '')).to.equal(0);

    expect(naturalCompare('', 'a')).to.be.lessThan(0);
    expect(naturalCompare('', '1')).to.be.lessThan(0);

    expect(naturalCompare('a', '')).to.be.greaterThan(0);
    expect(naturalCompare('1', '')).to.be.greaterThan(0);
  });

  it('compares characters by code', () => {
    expect(naturalCompare('a', 'a')).to.equal(0);
    expect(naturalCompare('a', 'b')).to.equal(-1);
    expect(naturalCompare('B', 'a')).to.equal(-1);
    expect(naturalCompare('a', 'ab')).to.be.lessThan(0);
  });

  it('compares digit runs by their numeric value', () => {
    expect(naturalCompare('2', '10')).to.equal(-1);
    expect(naturalCompare('10', '2')).to.equal(1);
    expect(naturalCompare('item2', 'item10')).to.equal(-1);
    expect(naturalCompare('a10b', 'a10c')).to.equal(-1);
  });

  it('sorts a list in natural order', () => {
    expect(
      ['file10', 'file1', 'file2'].sort(naturalCompare),
    ).to.deep.equal(['file1', 'file2', 'file10']);
  });
});
