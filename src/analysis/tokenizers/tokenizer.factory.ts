import { Tokenizer, TokenizerOptions } from '../interfaces/tokenizer.interface';
import { StandardTokenizer } from './standard-tokenizer';
import { WhitespaceTokenizer } from './whitespace-tokenizer';

export type TokenizerType = 'standard' | 'whitespace';

export const TOKENIZER_TYPES: readonly TokenizerType[] = ['standard', 'whitespace'];

export class TokenizerFactory {
  /**
   * Create a tokenizer based on the specified type and options
   */
  static createTokenizer(type: TokenizerType, options: TokenizerOptions = {}): Tokenizer {
    switch (type) {
      case 'standard':
        return new StandardTokenizer(options);
      case 'whitespace':
        return new WhitespaceTokenizer(options);
      default:
        throw new Error(`Unknown tokenizer type: ${String(type)}`);
    }
  }
}
