import { TokenFilter } from '../interfaces/token-filter.interface';

export interface ReplacementFilterOptions {
  replacements?: Record<string, string>;
}

/**
 * Swaps tokens found in a dictionary for their replacement, e.g. to keep a
 * proper name in its canonical form. Runs before case folding when listed first.
 */
export class ReplacementFilter implements TokenFilter {
  private readonly replacements: ReadonlyMap<string, string>;

  constructor(options: ReplacementFilterOptions = {}) {
    this.replacements = new Map(Object.entries(options.replacements ?? {}));
  }

  filter(tokens: string[]): string[] {
    if (!tokens || !Array.isArray(tokens)) {
      return [];
    }

    return tokens.map(token => this.replacements.get(token) ?? token);
  }

  getName(): string {
    return 'replacement';
  }
}
