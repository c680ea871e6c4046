export { RetrievalError } from './retrieval.error';
export { InvalidSequenceError } from './invalid-sequence.error';
export { InvalidArgumentError } from './invalid-argument.error';
export { IndexNotBuiltError } from './index-not-built.error';
export { AnalyzerNotFoundError } from './analyzer-not-found.error';
