import { Analyzer, AnalyzerConfig } from '../interfaces/analyzer.interface';
import { Tokenizer } from '../interfaces/tokenizer.interface';
import { TokenFilter } from '../interfaces/token-filter.interface';
import { TokenizerFactory } from '../tokenizers/tokenizer.factory';
import { TokenFilterFactory } from '../filters/token-filter.factory';

export class CustomAnalyzer implements Analyzer {
  private name: string;
  private tokenizer: Tokenizer;
  private filters: TokenFilter[];

  constructor(config: AnalyzerConfig) {
    this.name = config.name;
    this.tokenizer = TokenizerFactory.createTokenizer(
      config.tokenizer.type,
      config.tokenizer.options || {},
    );
    this.filters = (config.filters || []).map(filterConfig =>
      TokenFilterFactory.createFilter(filterConfig),
    );
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
