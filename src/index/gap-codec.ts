import { InvalidSequenceError } from '../common/errors';
import { Term } from '../common/interfaces/retrieval.interface';
import { InvertedIndex } from './inverted-index';

/**
 * Delta-encodes a strictly ascending sequence of non-negative integers.
 * The first gap equals the first value.
 */
export function valuesToGaps(values: readonly number[]): number[] {
  const gaps: number[] = [];
  let previous = 0;

  values.forEach((value, offset) => {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidSequenceError(`Expected a non-negative integer, got ${value}`, offset);
    }
    if (offset > 0 && value <= previous) {
      throw new InvalidSequenceError(
        `Values must be strictly ascending, ${value} follows ${previous}`,
        offset,
      );
    }
    gaps.push(value - previous);
    previous = value;
  });

  return gaps;
}

/**
 * Restores the ascending sequence from its gaps by running sum.
 */
export function gapsToValues(gaps: readonly number[]): number[] {
  const values: number[] = [];
  let offset = 0;

  gaps.forEach((gap, index) => {
    if (!Number.isSafeInteger(gap) || gap < 0) {
      throw new InvalidSequenceError(`Expected a non-negative integer gap, got ${gap}`, index);
    }
    // only the first gap may be zero (a leading value of 0)
    if (index > 0 && gap === 0) {
      throw new InvalidSequenceError('A zero gap would repeat the previous value', index);
    }
    offset += gap;
    values.push(offset);
  });

  return values;
}

/**
 * Converts every posting list of a numerically keyed index into gaps.
 */
export function buildGappedPostings(index: InvertedIndex): Map<Term, number[]> {
  const result = new Map<Term, number[]>();

  for (const [term, postings] of index.entries()) {
    const ids: number[] = [];
    for (const docId of postings) {
      if (typeof docId !== 'number') {
        throw new InvalidSequenceError(
          `Gap encoding needs numeric document ids, term '${term}' has '${docId}'`,
        );
      }
      ids.push(docId);
    }
    result.set(term, valuesToGaps(ids));
  }

  return result;
}

const CONTINUATION_MASK = 0x7f;
const TERMINATOR_BIT = 0x80;

/**
 * Variable-byte encodes gaps: 7 payload bits per byte, most significant group
 * first, high bit set on the final byte of each number.
 */
export function encodeVariableByte(gaps: readonly number[]): Buffer {
  const bytes: number[] = [];

  gaps.forEach((gap, index) => {
    if (!Number.isSafeInteger(gap) || gap < 0) {
      throw new InvalidSequenceError(`Expected a non-negative integer gap, got ${gap}`, index);
    }

    const groups: number[] = [];
    let remaining = gap;
    do {
      groups.unshift(remaining % 128);
      remaining = Math.floor(remaining / 128);
    } while (remaining > 0);

    groups[groups.length - 1] += TERMINATOR_BIT;
    bytes.push(...groups);
  });

  return Buffer.from(bytes);
}

export function decodeVariableByte(buffer: Uint8Array): number[] {
  const gaps: number[] = [];
  let current = 0;
  let pending = false;

  for (let i = 0; i < buffer.length; i++) {
    const byte = buffer[i];
    current = current * 128 + (byte & CONTINUATION_MASK);
    pending = true;

    if (byte & TERMINATOR_BIT) {
      gaps.push(current);
      current = 0;
      pending = false;
    }
  }

  if (pending) {
    throw new InvalidSequenceError('Truncated variable-byte buffer', buffer.length);
  }

  return gaps;
}
