import { RetrievalError } from './retrieval.error';

/**
 * Raised when a query arrives before any index snapshot has been built.
 * Retrying will not help until something calls one of the build methods.
 */
export class IndexNotBuiltError extends RetrievalError {
  constructor() {
    super('No index snapshot has been built yet');
    this.name = 'IndexNotBuiltError';
    Object.setPrototypeOf(this, IndexNotBuiltError.prototype);
  }
}
