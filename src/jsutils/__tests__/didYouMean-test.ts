import { expect } from 'chai';
import { describe, it } from 'mocha';

import { didYouMean } from '../didYouMean';
import { suggestionList } from '../suggestionList';

describe('didYouMean', () => {
  it('does not accept an empty list', () => {
    expect(didYouMean([])).to.equal('');
  });

  it('handles a single suggestion', () => {
    expect(didYouMean(['A'])).to.equal(' Did you mean "A"?');
  });

  it('handles two suggestions', () => {
    expect(didYouMean(['A', 'B'])).to.equal(' Did you mean "A" or "B"?');
  });

  it('handles multiple suggestions', () => {
    expect(didYouMean(['A', 'B', 'C'])).to.equal(
      ' Did you mean "A", "B", or "C"?',
    );
  });

  it('limits to five suggestions', () => {
    expect(didYouMean(['A', 'B', 'C', 'D', 'E', 'F'])).to.equal(
      ' Did you mean "A", "B", "C", "D", or "E"?',
    );
  });
});

describe('suggestionList', () => {
  it('returns results when input is empty', () => {
    expect(suggestionList('', ['a'])).to.deep.equal(['a']);
  });

  it('returns options sorted by lexical distance', () => {
    expect(suggestionList('abc', ['a', 'ab', 'abc'])).to.deep.equal([
      'abc',
      'ab',
      'a',
    ]);
  });

  it('rejects options beyond the distance threshold', () => {
    expect(suggestionList('bart', ['foo', 'bar'])).to.deep.equal(['bar']);
  });

  it('treats a case change as a single edit', () => {
    expect(suggestionList('ABC', ['abc', 'xyz'])).to.deep.equal(['abc']);
  });
});
