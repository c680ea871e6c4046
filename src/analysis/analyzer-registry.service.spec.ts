import { Test, TestingModule } from '@nestjs/testing';
import { AnalyzerNotFoundError } from '../common/errors';
import { AnalyzerRegistryService } from './analyzer-registry.service';
import { AnalyzerConfig } from './interfaces/analyzer.interface';
import { StandardAnalyzer } from './analyzers/standard-analyzer';

describe('AnalyzerRegistryService', () => {
  let registry: AnalyzerRegistryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [AnalyzerRegistryService],
    }).compile();

    registry = module.get<AnalyzerRegistryService>(AnalyzerRegistryService);
  });

  it('should register the default analyzers', () => {
    expect(registry.getNames()).toEqual(['standard', 'whitespace', 'simple']);
  });

  it('should process text through the standard analyzer', () => {
    const result = registry.getAnalyzer('standard').analyze('Hello world, this is a test!');
    expect(result).toEqual(['hello', 'world', 'this', 'test']);
  });

  it('should process text through the whitespace analyzer', () => {
    const result = registry.getAnalyzer('whitespace').analyze('Hello world, this is a test!');
    expect(result).toEqual(['Hello', 'world,', 'this', 'is', 'a', 'test!']);
  });

  it('should keep stop words in the simple analyzer', () => {
    const result = registry.getAnalyzer('simple').analyze('Hello world, this is a test!');
    expect(result).toEqual(['hello', 'world', 'this', 'is', 'a', 'test']);
  });

  it('should throw for an unknown analyzer', () => {
    expect(() => registry.getAnalyzer('missing')).toThrow(AnalyzerNotFoundError);
    expect(() => registry.getAnalyzer('missing')).toThrow("No analyzer found with name 'missing'");
  });

  it('should replace and remove analyzers by name', () => {
    const replacement = new StandardAnalyzer({ name: 'simple' });
    registry.registerAnalyzer(replacement);
    expect(registry.getAnalyzer('simple')).toBe(replacement);

    expect(registry.removeAnalyzer('simple')).toBe(true);
    expect(registry.hasAnalyzer('simple')).toBe(false);
    expect(registry.removeAnalyzer('simple')).toBe(false);
  });

  describe('createAnalyzer', () => {
    it('should create and register a stemming analyzer', () => {
      const analyzer = registry.createAnalyzer({
        name: 'stemmed',
        tokenizer: { type: 'standard', options: { removeSpecialChars: true } },
        filters: [{ type: 'lowercase' }, { type: 'stemming' }],
      });

      expect(analyzer.analyze('Running dogs jumped!')).toEqual(['run', 'dog', 'jump']);
      expect(registry.getAnalyzer('stemmed')).toBe(analyzer);
    });

    it('should apply filters in the order given', () => {
      const analyzer = registry.createAnalyzer({
        name: 'places',
        tokenizer: { type: 'whitespace' },
        filters: [
          { type: 'replacement', options: { replacements: { NYC: 'new_york' } } },
          { type: 'lowercase' },
          { type: 'stopword', options: { stopwords: ['big'] } },
        ],
      });

      expect(analyzer.analyze('NYC is Big')).toEqual(['new_york', 'is']);
    });

    it('should reject a configuration without a name', () => {
      expect(() => registry.createAnalyzer({ name: '', tokenizer: { type: 'standard' } })).toThrow(
        'Analyzer name is required and must be a string',
      );
    });

    it('should reject unknown tokenizer and filter types read from JSON', () => {
      const badTokenizer: AnalyzerConfig = JSON.parse(
        '{"name":"grams","tokenizer":{"type":"ngram"}}',
      );
      const badFilter: AnalyzerConfig = JSON.parse(
        '{"name":"fold","tokenizer":{"type":"standard"},"filters":[{"type":"asciifolding"}]}',
      );

      expect(() => registry.createAnalyzer(badTokenizer)).toThrow('Unknown tokenizer type: ngram');
      expect(() => registry.createAnalyzer(badFilter)).toThrow(
        'Unknown token filter type: asciifolding',
      );
      expect(registry.hasAnalyzer('grams')).toBe(false);
    });
  });
});
