import { Tokenizer, TokenizerOptions } from './tokenizer.interface';
import { TokenFilter } from './token-filter.interface';
import { TokenizerType } from '../tokenizers/tokenizer.factory';
import { TokenFilterConfig } from '../filters/token-filter.factory';

export interface AnalyzerConfig {
  name: string;
  tokenizer: {
    type: TokenizerType;
    options?: TokenizerOptions;
  };
  filters?: TokenFilterConfig[];
}

export interface Analyzer {
  /**
   * Analyze text input and return tokens after processing
   * @param text The text to analyze
   * @returns Processed tokens
   */
  analyze(text: string): string[];

  /**
   * Get the name of the analyzer
   */
  getName(): string;

  /**
   * Get the tokenizer used by this analyzer
   */
  getTokenizer(): Tokenizer;

  /**
   * Get the filters used by this analyzer
   */
  getFilters(): TokenFilter[];
}
