import { TokenFilter } from '../interfaces/token-filter.interface';

export interface StopwordFilterOptions {
  stopwords?: string[];
}

// Manning, Raghavan & Schütze, Introduction to Information Retrieval (2008), p. 26
export const ENGLISH_STOP_WORDS: readonly string[] = [
  'a',
  'an',
  'and',
  'are',
  'as',
  'at',
  'be',
  'by',
  'for',
  'from',
  'has',
  'he',
  'in',
  'is',
  'it',
  'its',
  'of',
  'on',
  'that',
  'the',
  'to',
  'was',
  'were',
  'will',
  'with',
];

export class StopwordFilter implements TokenFilter {
  private readonly stopwords: ReadonlySet<string>;

  constructor(options: StopwordFilterOptions = {}) {
    this.stopwords = new Set(options.stopwords ?? ENGLISH_STOP_WORDS);
  }

  filter(tokens: string[]): string[] {
    if (!tokens || !Array.isArray(tokens)) {
      return [];
    }

    return tokens.filter(token => !this.stopwords.has(token));
  }

  getName(): string {
    return 'stopword';
  }
}
