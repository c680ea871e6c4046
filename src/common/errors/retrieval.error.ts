/**
 * Base class for every error raised by the retrieval engine.
 * Callers can catch this to separate contract violations from unexpected failures.
 */
export class RetrievalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RetrievalError';
    Object.setPrototypeOf(this, RetrievalError.prototype);
  }
}
