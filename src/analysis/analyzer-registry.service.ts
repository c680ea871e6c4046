import { Injectable, Logger } from '@nestjs/common';
import { AnalyzerNotFoundError } from '../common/errors';
import { Analyzer, AnalyzerConfig } from './interfaces/analyzer.interface';
import { StandardAnalyzer } from './analyzers/standard-analyzer';
import { CustomAnalyzer } from './analyzers/custom-analyzer';
import { TOKENIZER_TYPES } from './tokenizers/tokenizer.factory';
import { TOKEN_FILTER_TYPES } from './filters/token-filter.factory';

/**
 * Named analyzers, held per instance so every consumer passes its
 * normalization setup explicitly.
 */
@Injectable()
export class AnalyzerRegistryService {
  private readonly logger = new Logger(AnalyzerRegistryService.name);
  private readonly analyzers = new Map<string, Analyzer>();

  constructor() {
    this.registerDefaultAnalyzers();
  }

  private registerDefaultAnalyzers(): void {
    this.registerAnalyzer(new StandardAnalyzer());
    this.registerAnalyzer(
      new CustomAnalyzer({
        name: 'whitespace',
        tokenizer: { type: 'whitespace' },
      }),
    );
    this.registerAnalyzer(
      new CustomAnalyzer({
        name: 'simple',
        tokenizer: { type: 'whitespace' },
        filters: [{ type: 'lowercase' }, { type: 'punctuation' }],
      }),
    );
  }

  /**
   * Register an analyzer under its own name, replacing any previous one
   */
  registerAnalyzer(analyzer: Analyzer): void {
    const name = analyzer.getName();
    if (this.analyzers.has(name)) {
      this.logger.debug(`Replacing analyzer '${name}'`);
    }
    this.analyzers.set(name, analyzer);
  }

  getAnalyzer(name: string): Analyzer {
    const analyzer = this.analyzers.get(name);
    if (!analyzer) {
      throw new AnalyzerNotFoundError(name);
    }
    return analyzer;
  }

  hasAnalyzer(name: string): boolean {
    return this.analyzers.has(name);
  }

  removeAnalyzer(name: string): boolean {
    return this.analyzers.delete(name);
  }

  getNames(): string[] {
    return Array.from(this.analyzers.keys());
  }

  /**
   * Build an analyzer from configuration and register it
   */
  createAnalyzer(config: AnalyzerConfig): Analyzer {
    this.validateConfig(config);
    const analyzer = new CustomAnalyzer(config);
    this.registerAnalyzer(analyzer);
    return analyzer;
  }

  private validateConfig(config: AnalyzerConfig): void {
    if (!config) {
      throw new Error('Analyzer configuration is required');
    }

    if (!config.name || typeof config.name !== 'string') {
      throw new Error('Analyzer name is required and must be a string');
    }

    if (!config.tokenizer || typeof config.tokenizer !== 'object') {
      throw new Error('Tokenizer configuration is required');
    }

    if (!TOKENIZER_TYPES.includes(config.tokenizer.type)) {
      throw new Error(`Unknown tokenizer type: ${String(config.tokenizer.type)}`);
    }

    if (config.filters !== undefined && !Array.isArray(config.filters)) {
      throw new Error('Filters configuration must be an array');
    }

    for (const filter of config.filters ?? []) {
      if (!TOKEN_FILTER_TYPES.includes(filter.type)) {
        throw new Error(`Unknown token filter type: ${String(filter.type)}`);
      }
    }
  }
}
