import { TokenFilter } from '../interfaces/token-filter.interface';

const NON_WORD = /[^\p{L}\p{N}_]/gu;

/**
 * Strips every character that is not a letter, digit or underscore, and drops
 * tokens left empty.
 */
export class PunctuationFilter implements TokenFilter {
  filter(tokens: string[]): string[] {
    if (!tokens || !Array.isArray(tokens)) {
      return [];
    }

    return tokens.map(token => token.replace(NON_WORD, '')).filter(token => token.length > 0);
  }

  getName(): string {
    return 'punctuation';
  }
}
