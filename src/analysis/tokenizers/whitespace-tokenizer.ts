import { Tokenizer, TokenizerOptions } from '../interfaces/tokenizer.interface';

/**
 * Splits on runs of whitespace and nothing else; punctuation stays attached.
 */
export class WhitespaceTokenizer implements Tokenizer {
  private options: TokenizerOptions;

  constructor(options: TokenizerOptions = {}) {
    this.options = {
      lowercase: false,
      ...options,
    };
  }

  tokenize(text: string): string[] {
    if (!text || typeof text !== 'string') {
      return [];
    }

    const processedText = this.options.lowercase ? text.toLowerCase() : text;

    return processedText.split(/\s+/).filter(token => token.length > 0);
  }

  getName(): string {
    return 'whitespace';
  }
}
