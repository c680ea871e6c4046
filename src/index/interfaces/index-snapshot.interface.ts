import { InvertedIndex } from '../inverted-index';
import { PositionalIndex } from '../positional-index';
import { KGramIndex } from '../kgram-index';

/**
 * Everything one build produces. A snapshot is never mutated; a rebuild
 * produces a new one.
 */
export interface IndexSnapshot {
  inverted: InvertedIndex;
  positional: PositionalIndex;
  kgram: KGramIndex;
  documentCount: number;
  tokenCount: number;
  builtAt: Date;
}

export interface KGramSettings {
  size: number;
  boundary: string;
}
