import { buildInvertedIndex } from '../index/inverted-index';
import { buildKGramIndex } from '../index/kgram-index';
import {
  literalKGrams,
  matchWildcardTerms,
  queryWildcard,
  wildcardMatch,
  wildcardToRegExp,
} from './wildcard-matcher';

describe('wildcard matcher', () => {
  const index = buildInvertedIndex(
    new Map([
      [1, ['cat', 'dog']],
      [2, ['car']],
      [3, ['cart', 'dog']],
      [4, ['dog']],
    ]),
  );
  const bigrams = buildKGramIndex(index, 2);

  describe('wildcardMatch', () => {
    it('should anchor the pattern at both ends', () => {
      expect(wildcardMatch('ca*', 'cat')).toBe(true);
      expect(wildcardMatch('ca*', 'scat')).toBe(false);
      expect(wildcardMatch('*at', 'cat')).toBe(true);
      expect(wildcardMatch('*at', 'cats')).toBe(false);
    });

    it('should let * match an empty run', () => {
      expect(wildcardMatch('car*', 'car')).toBe(true);
      expect(wildcardMatch('c*r*t', 'cart')).toBe(true);
    });

    it('should treat regular expression characters literally', () => {
      expect(wildcardMatch('a.c', 'abc')).toBe(false);
      expect(wildcardMatch('a.c', 'a.c')).toBe(true);
      expect(wildcardToRegExp('c+*').source).toBe('^c\\+.*$');
    });
  });

  describe('literalKGrams', () => {
    it('should skip grams that contain a wildcard', () => {
      expect(literalKGrams(bigrams, 'ca*')).toEqual(['$c', 'ca']);
      expect(literalKGrams(bigrams, '*rt')).toEqual(['rt', 't$']);
    });
  });

  describe('matchWildcardTerms', () => {
    it('should resolve a prefix pattern', () => {
      expect(matchWildcardTerms(bigrams, 'ca*')).toEqual(['car', 'cart', 'cat']);
    });

    it('should resolve a suffix pattern', () => {
      expect(matchWildcardTerms(bigrams, '*t')).toEqual(['cart', 'cat']);
    });

    it('should filter out false positives from the k-gram candidates', () => {
      // 'retired' holds $r, re and ed but does not start with 'red'
      const vocabulary = buildKGramIndex(['red', 'redo', 'retired'], 2);
      expect(Array.from(literalKGrams(vocabulary, 'red*'))).toEqual(['$r', 're', 'ed']);
      expect(matchWildcardTerms(vocabulary, 'red*')).toEqual(['red', 'redo']);
    });

    it('should intersect candidates across every literal gram', () => {
      expect(matchWildcardTerms(bigrams, 'c*rt')).toEqual(['cart']);
      expect(matchWildcardTerms(bigrams, 'c*t')).toEqual(['cart', 'cat']);
    });

    it('should match an exact term when there is no wildcard', () => {
      expect(matchWildcardTerms(bigrams, 'dog')).toEqual(['dog']);
      expect(matchWildcardTerms(bigrams, 'do')).toEqual([]);
    });

    it('should fall back to the whole vocabulary when no literal gram exists', () => {
      expect(matchWildcardTerms(bigrams, '*')).toEqual(['car', 'cart', 'cat', 'dog']);

      const wide = buildKGramIndex(index, 4);
      // every 4-gram of '$c*t$' crosses the wildcard
      expect(literalKGrams(wide, 'c*t')).toEqual([]);
      expect(matchWildcardTerms(wide, 'c*t')).toEqual(['cart', 'cat']);
    });

    it('should return nothing when a literal gram is unknown', () => {
      expect(matchWildcardTerms(bigrams, 'z*')).toEqual([]);
    });

    it('should reject a pattern containing the boundary', () => {
      expect(() => matchWildcardTerms(bigrams, 'c$*')).toThrow(/boundary character/);
    });
  });

  describe('queryWildcard', () => {
    it('should union the postings of every matching term', () => {
      expect(Array.from(queryWildcard(index, bigrams, 'ca*'))).toEqual([1, 2, 3]);
    });

    it('should return nothing when no term matches', () => {
      expect(Array.from(queryWildcard(index, bigrams, 'x*'))).toEqual([]);
    });

    it('should include the first matching term', () => {
      expect(Array.from(queryWildcard(index, bigrams, 'ca*t'))).toEqual([1, 3]);
    });

    it('should return all documents for a bare wildcard', () => {
      expect(Array.from(queryWildcard(index, bigrams, '*'))).toEqual([1, 2, 3, 4]);
    });

    it('should expand a pattern matching tens of thousands of terms', () => {
      const count = 20000;
      const streams = new Map<number, string[]>();
      for (let i = 0; i < count; i++) {
        streams.set(i, [`t${i}`]);
      }
      const large = buildInvertedIndex(streams);
      const grams = buildKGramIndex(large, 2);

      const everything = Array.from(queryWildcard(large, grams, '*'));
      expect(everything).toHaveLength(count);
      expect(everything[0]).toBe(0);
      expect(everything[count - 1]).toBe(count - 1);

      expect(Array.from(queryWildcard(large, grams, 't*'))).toHaveLength(count);
    });
  });
});
