import { RetrievalError } from './retrieval.error';

/**
 * Raised when a sequence that must be strictly ascending (a posting list, a gap
 * sequence, a position list) is not, or holds a value of the wrong kind.
 */
export class InvalidSequenceError extends RetrievalError {
  constructor(
    message: string,
    readonly offset?: number,
  ) {
    super(offset === undefined ? message : `${message} (at offset ${offset})`);
    this.name = 'InvalidSequenceError';
    Object.setPrototypeOf(this, InvalidSequenceError.prototype);
  }
}
