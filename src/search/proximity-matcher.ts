import { InvalidArgumentError } from '../common/errors';
import { compareDocIds } from '../common/doc-ids';
import {
  DocId,
  PositionalPostingList,
  PositionList,
} from '../common/interfaces/retrieval.interface';

export interface ProximityMatch {
  docId: DocId;
  /** positions from the first list that have a partner within range */
  positions: number[];
}

export function assertProximity(proximity: number): void {
  if (!Number.isSafeInteger(proximity) || proximity < 0) {
    throw new InvalidArgumentError('proximity', `expected a non-negative integer, got ${proximity}`);
  }
}

/**
 * For one document, returns each position in `first` that lies within
 * `proximity` tokens of some position in `second`.
 *
 * A window holds the positions of `second` admitted so far. The cursor over
 * `second` moves forward while its head is no further than `p1 + proximity`;
 * heads already more than `proximity` behind `p1` are skipped. Before testing
 * `p1`, the window is trimmed from the front while its oldest entry is more
 * than `proximity` behind.
 */
export function matchPositions(
  first: PositionList,
  second: PositionList,
  proximity: number,
): number[] {
  assertProximity(proximity);

  const matches: number[] = [];
  const window: number[] = [];
  let windowStart = 0;
  let cursor = 0;

  for (const p1 of first) {
    while (cursor < second.length && second[cursor] <= p1 + proximity) {
      const p2 = second[cursor];
      if (p1 - p2 <= proximity) {
        window.push(p2);
      }
      cursor++;
    }

    while (windowStart < window.length && p1 - window[windowStart] > proximity) {
      windowStart++;
    }

    if (windowStart < window.length) {
      matches.push(p1);
    }
  }

  return matches;
}

/**
 * Joins two positional posting lists on doc id and yields, per shared
 * document, the positions of the first term that are near the second term.
 * Documents without a match yield nothing.
 */
export function* positionalIntersect(
  first: PositionalPostingList,
  second: PositionalPostingList,
  proximity: number,
): Generator<ProximityMatch, void, undefined> {
  assertProximity(proximity);

  let i = 0;
  let j = 0;

  while (i < first.length && j < second.length) {
    const left = first[i];
    const right = second[j];
    const order = compareDocIds(left.docId, right.docId);

    if (order === 0) {
      const positions = matchPositions(left.positions, right.positions, proximity);
      if (positions.length > 0) {
        yield { docId: left.docId, positions };
      }
      i++;
      j++;
    } else if (order < 0) {
      i++;
    } else {
      j++;
    }
  }
}
