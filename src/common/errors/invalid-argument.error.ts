import { RetrievalError } from './retrieval.error';

export class InvalidArgumentError extends RetrievalError {
  constructor(
    readonly argument: string,
    detail: string,
  ) {
    super(`Invalid ${argument}: ${detail}`);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}
