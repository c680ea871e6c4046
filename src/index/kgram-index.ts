import { InvalidArgumentError } from '../common/errors';
import { Term } from '../common/interfaces/retrieval.interface';

export const DEFAULT_KGRAM_BOUNDARY = '$';

const EMPTY_TERMS: readonly Term[] = Object.freeze([]);

export function assertKGramSettings(k: number, boundary: string): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidArgumentError('k', `expected an integer >= 1, got ${k}`);
  }
  if (boundary.length !== 1) {
    throw new InvalidArgumentError('boundary', `expected a single character, got '${boundary}'`);
  }
}

/**
 * Yields every k-character window of `term` padded with `boundary` on both
 * ends. A padded term shorter than k yields nothing.
 */
export function* kgrams(
  term: string,
  k: number,
  boundary: string = DEFAULT_KGRAM_BOUNDARY,
): Generator<string> {
  assertKGramSettings(k, boundary);

  const padded = boundary + term + boundary;
  for (let i = 0; i + k <= padded.length; i++) {
    yield padded.slice(i, i + k);
  }
}

/**
 * Inserts `value` into the ascending array unless it is already present.
 * Returns false for a duplicate.
 */
export function sortedInsert(list: Term[], value: Term): boolean {
  let low = 0;
  let high = list.length;

  while (low < high) {
    const mid = (low + high) >> 1;
    if (list[mid] < value) low = mid + 1;
    else high = mid;
  }

  if (list[low] === value) return false;
  list.splice(low, 0, value);
  return true;
}

/**
 * k-gram -> sorted, unique list of vocabulary terms containing it.
 */
export class KGramIndex {
  constructor(
    readonly k: number,
    readonly boundary: string,
    private readonly grams: ReadonlyMap<string, readonly Term[]>,
    private readonly sortedVocabulary: readonly Term[],
  ) {}

  get size(): number {
    return this.grams.size;
  }

  getTerms(gram: string): readonly Term[] {
    return this.grams.get(gram) ?? EMPTY_TERMS;
  }

  vocabulary(): readonly Term[] {
    return this.sortedVocabulary;
  }

  gramsOf(term: string): Generator<string> {
    return kgrams(term, this.k, this.boundary);
  }
}

/**
 * Anything exposing a vocabulary, such as an `InvertedIndex`.
 */
export interface TermSource {
  terms(): Iterable<Term>;
}

export function buildKGramIndex(
  source: TermSource | Iterable<Term>,
  k: number,
  boundary: string = DEFAULT_KGRAM_BOUNDARY,
): KGramIndex {
  assertKGramSettings(k, boundary);

  const grams = new Map<string, Term[]>();
  const vocabulary: Term[] = [];
  const terms = isTermSource(source) ? source.terms() : source;

  for (const term of terms) {
    if (term.includes(boundary)) {
      throw new InvalidArgumentError('term', `'${term}' contains the boundary character '${boundary}'`);
    }
    sortedInsert(vocabulary, term);

    for (const gram of kgrams(term, k, boundary)) {
      let list = grams.get(gram);
      if (!list) {
        list = [];
        grams.set(gram, list);
      }
      sortedInsert(list, term);
    }
  }

  return new KGramIndex(k, boundary, grams, vocabulary);
}

function isTermSource(source: TermSource | Iterable<Term>): source is TermSource {
  return typeof source === 'object' && 'terms' in source && typeof source.terms === 'function';
}
