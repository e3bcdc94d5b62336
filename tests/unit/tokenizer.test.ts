import { describe, it, expect } from 'vitest';
import { tokenizeWords } from '../../src/lexicon/tokenizer.js';

describe('tokenizeWords', () => {
  it('splits trailing punctuation into its own token', () => {
    expect(tokenizeWords('Hello, world!')).toEqual(['Hello', ',', 'world', '!']);
  });

  it('splits leading and trailing brackets', () => {
    expect(tokenizeWords('(climate)')).toEqual(['(', 'climate', ')']);
  });

  it('detaches clitics', () => {
    expect(tokenizeWords("don't stop")).toEqual(['do', "n't", 'stop']);
    expect(tokenizeWords("it's")).toEqual(['it', "'s"]);
  });

  it('keeps hyphenated words whole', () => {
    expect(tokenizeWords('state-of-the-art')).toEqual(['state-of-the-art']);
  });

  it('keeps a run of punctuation together', () => {
    expect(tokenizeWords('wait ...')).toEqual(['wait', '...']);
  });

  it('ignores surrounding and repeated whitespace', () => {
    expect(tokenizeWords('  spaced \n\t out  ')).toEqual(['spaced', 'out']);
  });

  it('returns nothing for empty input', () => {
    expect(tokenizeWords('')).toEqual([]);
  });
});
