import { Analyzer } from '../interfaces/analyzer.interface';
import { Tokenizer } from '../interfaces/tokenizer.interface';
import { TokenFilter } from '../interfaces/token-filter.interface';
import { WhitespaceTokenizer } from '../tokenizers/whitespace-tokenizer';
import { LowercaseFilter } from '../filters/lowercase-filter';
import { PunctuationFilter } from '../filters/punctuation-filter';
import { StopwordFilter } from '../filters/stopword-filter';

/**
 * Whitespace split, lowercase, punctuation strip, English stop words removed.
 */
export class StandardAnalyzer implements Analyzer {
  private name: string;
  private tokenizer: Tokenizer;
  private filters: TokenFilter[];

  constructor(
    options: {
      name?: string;
      tokenizer?: Tokenizer;
      filters?: TokenFilter[];
    } = {},
  ) {
    this.name = options.name || 'standard';
    this.tokenizer = options.tokenizer || new WhitespaceTokenizer();
    this.filters = options.filters || [
      new LowercaseFilter(),
      new PunctuationFilter(),
      new StopwordFilter(),
    ];
  }

  analyze(text: string): string[] {
    if (!text) {
      return [];
    }

    let tokens = this.tokenizer.tokenize(text);

    for (const filter of this.filters) {
      tokens = filter.filter(tokens);
    }

    return tokens;
  }

  getName(): string {
    return this.name;
  }

  getTokenizer(): Tokenizer {
    return this.tokenizer;
  }

  getFilters(): TokenFilter[] {
    return this.filters;
  }
}
