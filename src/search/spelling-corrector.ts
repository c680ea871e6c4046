import { InvalidArgumentError } from '../common/errors';
import { Term } from '../common/interfaces/retrieval.interface';
import { KGramIndex } from '../index/kgram-index';
import { editDistance } from './edit-distance';
import { unionAll } from './sorted-merge';

export interface SuggestOptions {
  /** largest unit-cost edit distance a suggestion may have */
  maxDistance: number;
  limit: number;
}

export interface Suggestion {
  term: Term;
  distance: number;
}

/**
 * Vocabulary terms close to `term`. Candidates share at least one k-gram with
 * the term and are kept when their edit distance is within `maxDistance`.
 * Results are ordered by distance, then alphabetically.
 */
export function suggestCorrections(
  kgramIndex: KGramIndex,
  term: Term,
  options: SuggestOptions,
): Suggestion[] {
  const { maxDistance, limit } = options;
  if (!Number.isInteger(maxDistance) || maxDistance < 0) {
    throw new InvalidArgumentError('maxDistance', `expected a non-negative integer, got ${maxDistance}`);
  }
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('limit', `expected a non-negative integer, got ${limit}`);
  }

  const grams = Array.from(new Set(kgramIndex.gramsOf(term)));
  const candidates = unionAll(grams.map(gram => kgramIndex.getTerms(gram)));

  const suggestions: Suggestion[] = [];
  for (const candidate of candidates) {
    // a length gap alone can rule a candidate out
    if (Math.abs(candidate.length - term.length) > maxDistance) continue;

    const distance = editDistance(term, candidate);
    if (distance <= maxDistance) {
      suggestions.push({ term: candidate, distance });
    }
  }

  suggestions.sort((a, b) => a.distance - b.distance || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0));
  return suggestions.slice(0, limit);
}
