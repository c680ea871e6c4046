import { Tokenizer, TokenizerOptions } from '../interfaces/tokenizer.interface';

export class StandardTokenizer implements Tokenizer {
  private options: Required<TokenizerOptions>;

  constructor(options: TokenizerOptions = {}) {
    this.options = {
      lowercase: true,
      removeSpecialChars: true,
      specialCharsPattern: /[^\p{L}\p{N}_\s]/gu,
      ...options,
    };
  }

  tokenize(text: string): string[] {
    if (!text || typeof text !== 'string') {
      return [];
    }

    let processedText = text;

    if (this.options.lowercase) {
      processedText = processedText.toLowerCase();
    }

    if (this.options.removeSpecialChars) {
      processedText = processedText.replace(this.options.specialCharsPattern, ' ');
    }

    return processedText.split(/\s+/).filter(token => token.length > 0);
  }

  getName(): string {
    return 'standard';
  }
}
