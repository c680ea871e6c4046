/// <reference path="../../types/porter-stemmer.d.ts" />
import { TokenFilter } from '../interfaces/token-filter.interface';
import { stemmer } from 'porter-stemmer';

export class StemmingFilter implements TokenFilter {
  filter(tokens: string[]): string[] {
    if (!tokens || !Array.isArray(tokens)) {
      return [];
    }

    return tokens.map(token => stemmer(token));
  }

  getName(): string {
    return 'stemming';
  }
}
