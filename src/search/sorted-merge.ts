import { InvalidSequenceError } from '../common/errors';
import { compareDocIds } from '../common/doc-ids';
import { Comparator, DocId } from '../common/interfaces/retrieval.interface';

/**
 * Keys the merge engine can order: doc ids, terms and positions.
 */
export type SortKey = DocId;

type Step<T> = IteratorResult<T, undefined>;

const END: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Pulls values from an ascending iterable and fails as soon as one is not
 * strictly greater than its predecessor.
 */
class AscendingCursor<T extends SortKey> {
  private readonly iterator: Iterator<T>;
  private previous: Step<T> = END;
  private offset = 0;

  constructor(
    source: Iterable<T>,
    private readonly compare: Comparator<T>,
    private readonly label: string,
  ) {
    this.iterator = source[Symbol.iterator]();
  }

  next(): Step<T> {
    const step = this.iterator.next();
    if (step.done) return END;

    if (!this.previous.done && this.compare(this.previous.value, step.value) >= 0) {
      throw new InvalidSequenceError(`${this.label} is not strictly ascending`, this.offset);
    }

    this.offset++;
    this.previous = { done: false, value: step.value };
    return this.previous;
  }
}

/**
 * Lazily yields the elements present in both ascending sequences.
 * Stops as soon as either side runs out.
 */
export function* intersectSorted<T extends SortKey = DocId>(
  left: Iterable<T>,
  right: Iterable<T>,
  compare: Comparator<T> = compareDocIds,
): Generator<T, void, undefined> {
  const a = new AscendingCursor(left, compare, 'left operand');
  const b = new AscendingCursor(right, compare, 'right operand');
  let x = a.next();
  let y = b.next();

  while (!x.done && !y.done) {
    const order = compare(x.value, y.value);
    if (order === 0) {
      yield x.value;
      x = a.next();
      y = b.next();
    } else if (order < 0) {
      x = a.next();
    } else {
      y = b.next();
    }
  }
}

/**
 * Lazily yields every element of either ascending sequence once, in order.
 */
export function* unionSorted<T extends SortKey = DocId>(
  left: Iterable<T>,
  right: Iterable<T>,
  compare: Comparator<T> = compareDocIds,
): Generator<T, void, undefined> {
  const a = new AscendingCursor(left, compare, 'left operand');
  const b = new AscendingCursor(right, compare, 'right operand');
  let x = a.next();
  let y = b.next();

  while (!x.done && !y.done) {
    const order = compare(x.value, y.value);
    if (order === 0) {
      yield x.value;
      x = a.next();
      y = b.next();
    } else if (order < 0) {
      yield x.value;
      x = a.next();
    } else {
      yield y.value;
      y = b.next();
    }
  }

  for (; !x.done; x = a.next()) yield x.value;
  for (; !y.done; y = b.next()) yield y.value;
}

type Merge<T> = (left: Iterable<T>, right: Iterable<T>, compare: Comparator<T>) => Iterable<T>;

// Pairs operands as a balanced tree so generator nesting grows with log2(n).
function reduceBalanced<T extends SortKey>(
  operands: readonly Iterable<T>[],
  merge: Merge<T>,
  compare: Comparator<T>,
  low = 0,
  high = operands.length,
): Iterable<T> {
  if (high - low === 1) return operands[low];
  const middle = low + Math.floor((high - low) / 2);
  return merge(
    reduceBalanced(operands, merge, compare, low, middle),
    reduceBalanced(operands, merge, compare, middle, high),
    compare,
  );
}

/**
 * N-way intersection as a balanced pairwise reduction. No operands gives an
 * empty sequence.
 */
export function* intersectAll<T extends SortKey = DocId>(
  lists: Iterable<Iterable<T>>,
  compare: Comparator<T> = compareDocIds,
): Generator<T, void, undefined> {
  const operands = Array.from(lists);
  if (operands.length === 0) return;
  yield* checkedAscending(reduceBalanced(operands, intersectSorted, compare), compare);
}

/**
 * N-way union as a balanced pairwise reduction.
 */
export function* unionAll<T extends SortKey = DocId>(
  lists: Iterable<Iterable<T>>,
  compare: Comparator<T> = compareDocIds,
): Generator<T, void, undefined> {
  const operands = Array.from(lists);
  if (operands.length === 0) return;
  yield* checkedAscending(reduceBalanced(operands, unionSorted, compare), compare);
}

// a lone operand goes through a cursor so it gets the same ordering check
function* checkedAscending<T extends SortKey>(
  source: Iterable<T>,
  compare: Comparator<T>,
): Generator<T, void, undefined> {
  const cursor = new AscendingCursor(source, compare, 'operand');
  for (let step = cursor.next(); !step.done; step = cursor.next()) {
    yield step.value;
  }
}

/**
 * Takes at most `limit` values, leaving the rest of the sequence unread.
 */
export function take<T>(source: Iterable<T>, limit: number): T[] {
  const out: T[] = [];
  if (limit <= 0) return out;

  for (const value of source) {
    out.push(value);
    if (out.length >= limit) break;
  }
  return out;
}
