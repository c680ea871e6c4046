import { TokenFilter } from '../interfaces/token-filter.interface';

export class LowercaseFilter implements TokenFilter {
  filter(tokens: string[]): string[] {
    if (!tokens || !Array.isArray(tokens)) {
      return [];
    }

    return tokens.map(token => token.toLowerCase());
  }

  getName(): string {
    return 'lowercase';
  }
}
