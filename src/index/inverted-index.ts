import { InvalidArgumentError } from '../common/errors';
import { isDocId, sortedStreams } from '../common/doc-ids';
import {
  DocId,
  PostingList,
  Term,
  TermStreamCollection,
} from '../common/interfaces/retrieval.interface';

const EMPTY_POSTINGS: PostingList = Object.freeze([]);

/**
 * Read-only mapping from term to its posting list.
 * Lookups of unknown terms return an empty list.
 */
export class InvertedIndex {
  private readonly postings: ReadonlyMap<Term, PostingList>;

  constructor(postings: ReadonlyMap<Term, PostingList>) {
    this.postings = postings;
  }

  get size(): number {
    return this.postings.size;
  }

  getPostings(term: Term): PostingList {
    return this.postings.get(term) ?? EMPTY_POSTINGS;
  }

  has(term: Term): boolean {
    return this.postings.has(term);
  }

  documentFrequency(term: Term): number {
    return this.getPostings(term).length;
  }

  /**
   * Vocabulary in ascending order.
   */
  terms(): Term[] {
    return Array.from(this.postings.keys()).sort();
  }

  entries(): IterableIterator<[Term, PostingList]> {
    return this.postings.entries();
  }
}

/**
 * Builds a term -> doc id index in one pass over the documents in ascending id
 * order. A doc id is appended only when it is not already the last entry, so
 * each list comes out ascending and unique.
 */
export function buildInvertedIndex(collection: TermStreamCollection): InvertedIndex {
  const postings = new Map<Term, DocId[]>();

  for (const [docId, stream] of sortedStreams(collection)) {
    if (!isDocId(docId)) {
      throw new InvalidArgumentError('document id', `${String(docId)} is not a string or finite number`);
    }

    for (const term of stream) {
      let list = postings.get(term);
      if (!list) {
        list = [];
        postings.set(term, list);
      }
      if (list.length === 0 || list[list.length - 1] !== docId) {
        list.push(docId);
      }
    }
  }

  return new InvertedIndex(postings);
}
