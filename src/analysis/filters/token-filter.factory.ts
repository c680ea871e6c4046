import { TokenFilter } from '../interfaces/token-filter.interface';
import { LowercaseFilter } from './lowercase-filter';
import { PunctuationFilter } from './punctuation-filter';
import { ReplacementFilter, ReplacementFilterOptions } from './replacement-filter';
import { StopwordFilter, StopwordFilterOptions } from './stopword-filter';
import { StemmingFilter } from './stemming-filter';

export type TokenFilterConfig =
  | { type: 'lowercase' }
  | { type: 'punctuation' }
  | { type: 'stemming' }
  | { type: 'stopword'; options?: StopwordFilterOptions }
  | { type: 'replacement'; options?: ReplacementFilterOptions };

export type TokenFilterType = TokenFilterConfig['type'];

export const TOKEN_FILTER_TYPES: readonly TokenFilterType[] = [
  'lowercase',
  'punctuation',
  'stemming',
  'stopword',
  'replacement',
];

export class TokenFilterFactory {
  /**
   * Create a token filter from its configuration
   */
  static createFilter(config: TokenFilterConfig): TokenFilter {
    switch (config.type) {
      case 'lowercase':
        return new LowercaseFilter();
      case 'punctuation':
        return new PunctuationFilter();
      case 'stemming':
        return new StemmingFilter();
      case 'stopword':
        return new StopwordFilter(config.options);
      case 'replacement':
        return new ReplacementFilter(config.options);
      default:
        throw new Error(`Unknown token filter type: ${JSON.stringify(config)}`);
    }
  }
}
