import { InvalidArgumentError } from '../common/errors';
import { DocId, Term } from '../common/interfaces/retrieval.interface';
import { InvertedIndex } from '../index/inverted-index';
import { KGramIndex } from '../index/kgram-index';
import { intersectAll, unionAll } from './sorted-merge';

export const WILDCARD = '*';

const REGEXP_SPECIAL = /[.+?^${}()|[\]\\]/g;

/**
 * Compiles a glob-style pattern where `*` matches any run of characters
 * (including none) and everything else is literal. The match is anchored.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .split(WILDCARD)
    .map(part => part.replace(REGEXP_SPECIAL, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}$`, 's');
}

export function wildcardMatch(pattern: string, term: Term): boolean {
  return wildcardToRegExp(pattern).test(term);
}

/**
 * The pattern's k-grams (padded the same way as indexed terms) that contain no
 * wildcard.
 */
export function literalKGrams(kgramIndex: KGramIndex, pattern: string): string[] {
  const literal: string[] = [];
  for (const gram of kgramIndex.gramsOf(pattern)) {
    if (!gram.includes(WILDCARD)) literal.push(gram);
  }
  return literal;
}

/**
 * Resolves a wildcard pattern to the vocabulary terms it matches, in ascending
 * order. Candidates come from intersecting the term lists of the pattern's
 * literal k-grams; when the pattern has none, every vocabulary term is a
 * candidate. Candidates are then checked against the full pattern.
 */
export function matchWildcardTerms(kgramIndex: KGramIndex, pattern: string): Term[] {
  if (pattern.includes(kgramIndex.boundary)) {
    throw new InvalidArgumentError(
      'pattern',
      `'${pattern}' contains the boundary character '${kgramIndex.boundary}'`,
    );
  }

  const grams = literalKGrams(kgramIndex, pattern);
  const candidates: Iterable<Term> =
    grams.length > 0
      ? intersectAll(grams.map(gram => kgramIndex.getTerms(gram)))
      : kgramIndex.vocabulary();

  const matcher = wildcardToRegExp(pattern);
  const terms: Term[] = [];
  for (const term of candidates) {
    if (matcher.test(term)) terms.push(term);
  }
  return terms;
}

/**
 * Documents containing any term that matches the pattern: the union of the
 * matching terms' posting lists.
 */
export function queryWildcard(
  index: InvertedIndex,
  kgramIndex: KGramIndex,
  pattern: string,
): Generator<DocId, void, undefined> {
  const terms = matchWildcardTerms(kgramIndex, pattern);
  return unionAll(terms.map(term => index.getPostings(term)));
}
