import { RetrievalError } from './retrieval.error';

export class AnalyzerNotFoundError extends RetrievalError {
  constructor(readonly analyzerName: string) {
    super(`No analyzer found with name '${analyzerName}'`);
    this.name = 'AnalyzerNotFoundError';
    Object.setPrototypeOf(this, AnalyzerNotFoundError.prototype);
  }
}
