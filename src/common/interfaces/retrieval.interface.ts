/**
 * A normalized term as produced by an analyzer. Equality is exact and ordering
 * is plain string comparison.
 */
export type Term = string;

/**
 * Document key assigned by whoever loads the collection. Numbers sort before
 * strings; see `compareDocIds`.
 */
export type DocId = string | number;

/**
 * Ascending, duplicate-free document ids for one term.
 */
export type PostingList = readonly DocId[];

/**
 * Ascending, duplicate-free 0-based token offsets of one term inside one document.
 */
export type PositionList = readonly number[];

export interface PositionalPosting {
  docId: DocId;
  positions: PositionList;
}

export type PositionalPostingList = readonly PositionalPosting[];

/**
 * Anything that can be read as `docId -> term stream`.
 * Plain records are accepted for collections keyed by string ids.
 */
export type TermStreamCollection =
  | ReadonlyMap<DocId, Iterable<Term>>
  | Readonly<Record<string, Iterable<Term>>>;

export type Comparator<T> = (a: T, b: T) => number;
