import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocId, Term } from '../common/interfaces/retrieval.interface';
import { RetrievalConfig } from '../config/retrieval.config';
import { IndexService } from '../index/index.service';
import { EditDistanceTable, EditOperation } from './edit-distance';
import { intersectAll, take, unionAll } from './sorted-merge';
import { positionalIntersect, ProximityMatch } from './proximity-matcher';
import { matchWildcardTerms, queryWildcard } from './wildcard-matcher';
import { suggestCorrections, SuggestOptions, Suggestion } from './spelling-corrector';

/**
 * Query entry points over the current index snapshot. The engine functions
 * underneath are lazy; results are collected here, stopping early when a
 * limit is given.
 */
@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);

  constructor(
    private readonly indexService: IndexService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Documents containing every term. No terms matches nothing.
   */
  and(terms: readonly Term[], limit = Infinity): DocId[] {
    const { inverted } = this.indexService.getSnapshot();
    const results = take(
      intersectAll(terms.map(term => inverted.getPostings(term))),
      limit,
    );
    this.logger.debug(`AND [${terms.join(', ')}] -> ${results.length} documents`);
    return results;
  }

  /**
   * Documents containing at least one of the terms.
   */
  or(terms: readonly Term[], limit = Infinity): DocId[] {
    const { inverted } = this.indexService.getSnapshot();
    const results = take(
      unionAll(terms.map(term => inverted.getPostings(term))),
      limit,
    );
    this.logger.debug(`OR [${terms.join(', ')}] -> ${results.length} documents`);
    return results;
  }

  /**
   * Documents where `first` occurs within `proximity` tokens of `second`, with
   * the matching positions of `first`.
   */
  proximity(first: Term, second: Term, proximity: number, limit = Infinity): ProximityMatch[] {
    const { positional } = this.indexService.getSnapshot();
    const results = take(
      positionalIntersect(positional.getPostings(first), positional.getPostings(second), proximity),
      limit,
    );
    this.logger.debug(`'${first}' /${proximity} '${second}' -> ${results.length} documents`);
    return results;
  }

  wildcard(pattern: string, limit = Infinity): DocId[] {
    const { inverted, kgram } = this.indexService.getSnapshot();
    const results = take(queryWildcard(inverted, kgram, pattern), limit);
    this.logger.debug(`Wildcard '${pattern}' -> ${results.length} documents`);
    return results;
  }

  wildcardTerms(pattern: string): Term[] {
    return matchWildcardTerms(this.indexService.getSnapshot().kgram, pattern);
  }

  /**
   * Vocabulary terms within a small edit distance of `term`, closest first.
   */
  suggest(term: Term, options: Partial<SuggestOptions> = {}): Suggestion[] {
    const defaults = this.configService.getOrThrow<RetrievalConfig>('retrieval').suggest;
    return suggestCorrections(this.indexService.getSnapshot().kgram, term, {
      maxDistance: options.maxDistance ?? defaults.maxDistance,
      limit: options.limit ?? defaults.limit,
    });
  }

  editDistance(source: string, destination: string): number {
    return EditDistanceTable.compute(source, destination).distance;
  }

  alignment(source: string, destination: string): EditOperation<string>[] {
    return EditDistanceTable.compute(source, destination).alignment();
  }
}
