import { InvalidArgumentError } from '../common/errors';
import { buildPositionalIndex } from '../index/positional-index';
import { matchPositions, positionalIntersect } from './proximity-matcher';

function bruteForce(first: number[], second: number[], proximity: number): number[] {
  return first.filter(p1 => second.some(p2 => Math.abs(p1 - p2) <= proximity));
}

// every ascending subset of {0..6}
function positionSets(): number[][] {
  const out: number[][] = [];
  for (let mask = 0; mask < 128; mask++) {
    const positions: number[] = [];
    for (let bit = 0; bit < 7; bit++) {
      if (mask & (1 << bit)) positions.push(bit);
    }
    out.push(positions);
  }
  return out;
}

describe('proximity matcher', () => {
  describe('matchPositions', () => {
    it('should agree with a brute-force scan on every small case', () => {
      const sets = positionSets();
      for (const proximity of [0, 1, 2, 3, 7]) {
        for (const first of sets) {
          for (const second of sets) {
            expect(matchPositions(first, second, proximity)).toEqual(
              bruteForce(first, second, proximity),
            );
          }
        }
      }
    });

    it('should require equal positions when proximity is 0', () => {
      expect(matchPositions([1, 4, 6], [0, 4, 7], 0)).toEqual([4]);
    });

    it('should match positions on either side', () => {
      expect(matchPositions([5], [3], 2)).toEqual([5]);
      expect(matchPositions([5], [7], 2)).toEqual([5]);
      expect(matchPositions([5], [8], 2)).toEqual([]);
    });

    it('should reuse a partner for several nearby positions', () => {
      expect(matchPositions([10, 11, 12, 20], [11], 1)).toEqual([10, 11, 12]);
    });

    it('should drop window entries once they fall behind', () => {
      // 2 is admitted for p1 = 3 and must be evicted before p1 = 9
      expect(matchPositions([3, 9, 14], [2, 15], 1)).toEqual([3, 14]);
    });

    it('should handle empty position lists', () => {
      expect(matchPositions([], [1, 2], 3)).toEqual([]);
      expect(matchPositions([1, 2], [], 3)).toEqual([]);
    });

    it('should reject a negative or fractional proximity', () => {
      expect(() => matchPositions([1], [1], -1)).toThrow(InvalidArgumentError);
      expect(() => matchPositions([1], [1], 1.5)).toThrow(/non-negative integer/);
    });
  });

  describe('positionalIntersect', () => {
    const index = buildPositionalIndex(
      new Map([
        [1, ['a', 'b', 'c']],
        [2, ['x', 'a', 'y', 'b']],
      ]),
    );

    it('should match documents where the terms are within range', () => {
      const matches = Array.from(
        positionalIntersect(index.getPostings('a'), index.getPostings('b'), 1),
      );
      expect(matches).toEqual([{ docId: 1, positions: [0] }]);
    });

    it('should widen the match as proximity grows', () => {
      const matches = Array.from(
        positionalIntersect(index.getPostings('a'), index.getPostings('b'), 2),
      );
      expect(matches).toEqual([
        { docId: 1, positions: [0] },
        { docId: 2, positions: [1] },
      ]);
    });

    it('should skip documents that contain only one of the terms', () => {
      const matches = Array.from(
        positionalIntersect(index.getPostings('a'), index.getPostings('x'), 5),
      );
      expect(matches).toEqual([{ docId: 2, positions: [1] }]);
    });

    it('should yield nothing for an absent term', () => {
      expect(
        Array.from(positionalIntersect(index.getPostings('a'), index.getPostings('zebra'), 3)),
      ).toEqual([]);
    });

    it('should report every matching position of the first term', () => {
      const repeated = buildPositionalIndex(
        new Map([[7, ['new', 'york', 'and', 'new', 'jersey', 'new', 'york']]]),
      );
      const matches = Array.from(
        positionalIntersect(repeated.getPostings('new'), repeated.getPostings('york'), 1),
      );
      expect(matches).toEqual([{ docId: 7, positions: [0, 5] }]);
    });
  });
});
