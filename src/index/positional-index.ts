import { InvalidArgumentError } from '../common/errors';
import { compareDocIds, isDocId, sortedStreams } from '../common/doc-ids';
import {
  DocId,
  PositionalPostingList,
  PositionList,
  Term,
  TermStreamCollection,
} from '../common/interfaces/retrieval.interface';

const EMPTY_POSTINGS: PositionalPostingList = Object.freeze([]);
const EMPTY_POSITIONS: PositionList = Object.freeze([]);

interface MutablePosting {
  docId: DocId;
  positions: number[];
}

export class PositionalIndex {
  constructor(private readonly postings: ReadonlyMap<Term, PositionalPostingList>) {}

  get size(): number {
    return this.postings.size;
  }

  getPostings(term: Term): PositionalPostingList {
    return this.postings.get(term) ?? EMPTY_POSTINGS;
  }

  /**
   * Positions of `term` inside one document, found by binary search over the
   * term's doc ids.
   */
  getPositions(term: Term, docId: DocId): PositionList {
    const list = this.getPostings(term);
    let low = 0;
    let high = list.length - 1;

    while (low <= high) {
      const mid = (low + high) >> 1;
      const order = compareDocIds(list[mid].docId, docId);
      if (order === 0) return list[mid].positions;
      if (order < 0) low = mid + 1;
      else high = mid - 1;
    }

    return EMPTY_POSITIONS;
  }

  has(term: Term): boolean {
    return this.postings.has(term);
  }

  terms(): Term[] {
    return Array.from(this.postings.keys()).sort();
  }
}

/**
 * Builds term -> [(docId, positions)] where a position is the 0-based offset of
 * the term inside the document's term stream.
 */
export function buildPositionalIndex(collection: TermStreamCollection): PositionalIndex {
  const postings = new Map<Term, MutablePosting[]>();

  for (const [docId, stream] of sortedStreams(collection)) {
    if (!isDocId(docId)) {
      throw new InvalidArgumentError('document id', `${String(docId)} is not a string or finite number`);
    }

    let position = 0;
    for (const term of stream) {
      let list = postings.get(term);
      if (!list) {
        list = [];
        postings.set(term, list);
      }

      const last = list[list.length - 1];
      if (last === undefined || last.docId !== docId) {
        list.push({ docId, positions: [position] });
      } else {
        last.positions.push(position);
      }
      position++;
    }
  }

  return new PositionalIndex(postings);
}
