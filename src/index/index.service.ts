import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IndexNotBuiltError } from '../common/errors';
import { DocId, Term } from '../common/interfaces/retrieval.interface';
import { AnalyzerRegistryService } from '../analysis/analyzer-registry.service';
import { RetrievalConfig } from '../config/retrieval.config';
import { IndexSnapshot, KGramSettings } from './interfaces/index-snapshot.interface';
import { buildInvertedIndex } from './inverted-index';
import { buildPositionalIndex } from './positional-index';
import { buildKGramIndex } from './kgram-index';

@Injectable()
export class IndexService {
  private readonly logger = new Logger(IndexService.name);
  private snapshot: IndexSnapshot | undefined;

  constructor(
    private readonly configService: ConfigService,
    private readonly analyzerRegistry: AnalyzerRegistryService,
  ) {}

  /**
   * Analyze raw document contents and build a fresh snapshot from the
   * resulting term streams.
   */
  build(contents: ReadonlyMap<DocId, string>, analyzerName?: string): IndexSnapshot {
    const name = analyzerName ?? this.retrievalConfig().defaultAnalyzer;
    const analyzer = this.analyzerRegistry.getAnalyzer(name);

    const streams = new Map<DocId, Term[]>();
    for (const [docId, text] of contents) {
      streams.set(docId, analyzer.analyze(text));
    }

    this.logger.debug(`Analyzed ${streams.size} documents with '${name}'`);
    return this.buildFromTermStreams(streams);
  }

  /**
   * Build every index from already-normalized term streams and swap the new
   * snapshot in. Readers holding the previous snapshot keep a consistent view.
   */
  buildFromTermStreams(
    streams: ReadonlyMap<DocId, readonly Term[]>,
    kgram: KGramSettings = this.retrievalConfig().kgram,
  ): IndexSnapshot {
    const startTime = Date.now();

    const inverted = buildInvertedIndex(streams);
    const positional = buildPositionalIndex(streams);
    const kgramTerms = inverted.terms().filter(term => !term.includes(kgram.boundary));
    const skipped = inverted.size - kgramTerms.length;
    if (skipped > 0) {
      this.logger.warn(
        `Left ${skipped} terms containing the boundary '${kgram.boundary}' out of the k-gram index`,
      );
    }
    const kgramIndex = buildKGramIndex(kgramTerms, kgram.size, kgram.boundary);

    let tokenCount = 0;
    for (const stream of streams.values()) {
      tokenCount += stream.length;
    }

    const snapshot: IndexSnapshot = {
      inverted,
      positional,
      kgram: kgramIndex,
      documentCount: streams.size,
      tokenCount,
      builtAt: new Date(),
    };
    this.snapshot = snapshot;

    this.logger.log(
      `Built index: ${snapshot.documentCount} documents, ${tokenCount} tokens, ` +
        `${inverted.size} terms, ${kgramIndex.size} ${kgram.size}-grams in ${Date.now() - startTime}ms`,
    );

    return snapshot;
  }

  hasSnapshot(): boolean {
    return this.snapshot !== undefined;
  }

  getSnapshot(): IndexSnapshot {
    if (!this.snapshot) {
      throw new IndexNotBuiltError();
    }
    return this.snapshot;
  }

  private retrievalConfig(): RetrievalConfig {
    return this.configService.getOrThrow<RetrievalConfig>('retrieval');
  }
}
