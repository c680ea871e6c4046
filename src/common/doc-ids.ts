import { Comparator, DocId, Term, TermStreamCollection } from './interfaces/retrieval.interface';

/**
 * Total order over document ids: numbers before strings, numbers numerically,
 * strings by code unit.
 */
export const compareDocIds: Comparator<DocId> = (a, b) => {
  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
};

export function isDocId(value: unknown): value is DocId {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

function isStreamMap(
  collection: TermStreamCollection,
): collection is ReadonlyMap<DocId, Iterable<Term>> {
  return collection instanceof Map;
}

/**
 * Returns the collection's entries ordered by ascending doc id.
 */
export function sortedStreams(collection: TermStreamCollection): Array<[DocId, Iterable<Term>]> {
  const entries: Array<[DocId, Iterable<Term>]> =
    isStreamMap(collection) ? Array.from(collection.entries()) : Object.entries(collection);

  return entries.sort(([a], [b]) => compareDocIds(a, b));
}
