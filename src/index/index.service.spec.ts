import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalyzerRegistryService } from '../analysis/analyzer-registry.service';
import { AnalyzerNotFoundError, IndexNotBuiltError } from '../common/errors';
import { RetrievalConfig } from '../config/retrieval.config';
import { IndexService } from './index.service';

const retrieval: RetrievalConfig = {
  kgram: { size: 2, boundary: '$' },
  defaultAnalyzer: 'standard',
  corpus: { directory: 'documents', extension: 'txt' },
  suggest: { maxDistance: 2, limit: 10 },
};

describe('IndexService', () => {
  let service: IndexService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        IndexService,
        AnalyzerRegistryService,
        {
          provide: ConfigService,
          useValue: new ConfigService({ retrieval }),
        },
      ],
    }).compile();

    service = module.get<IndexService>(IndexService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('should refuse to hand out a snapshot before the first build', () => {
    expect(service.hasSnapshot()).toBe(false);
    expect(() => service.getSnapshot()).toThrow(IndexNotBuiltError);
  });

  it('should analyze documents with the default analyzer', () => {
    const snapshot = service.build(
      new Map([
        ['b.txt', 'The Cat sat on the mat.'],
        ['a.txt', 'A cat, a dog!'],
      ]),
    );

    expect(snapshot.documentCount).toBe(2);
    expect(snapshot.tokenCount).toBe(5);
    expect(snapshot.inverted.getPostings('cat')).toEqual(['a.txt', 'b.txt']);
    expect(snapshot.inverted.has('the')).toBe(false);
    expect(snapshot.positional.getPositions('mat', 'b.txt')).toEqual([2]);
    expect(snapshot.kgram.getTerms('$c')).toEqual(['cat']);
    expect(service.getSnapshot()).toBe(snapshot);
  });

  it('should use the named analyzer when given', () => {
    const snapshot = service.build(new Map([[1, 'The Cat']]), 'whitespace');
    expect(snapshot.inverted.terms()).toEqual(['Cat', 'The']);
  });

  it('should keep terms containing the boundary out of the k-gram index only', () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    const snapshot = service.build(new Map([[1, 'it costs $5 today']]), 'whitespace');

    expect(snapshot.inverted.getPostings('$5')).toEqual([1]);
    expect(snapshot.positional.getPositions('$5', 1)).toEqual([2]);
    expect(snapshot.kgram.vocabulary()).toEqual(['costs', 'it', 'today']);
    expect(warn).toHaveBeenCalledWith(
      "Left 1 terms containing the boundary '$' out of the k-gram index",
    );

    warn.mockRestore();
  });

  it('should fail for an unknown analyzer', () => {
    expect(() => service.build(new Map([[1, 'x']]), 'missing')).toThrow(AnalyzerNotFoundError);
  });

  it('should swap in a new snapshot on rebuild without touching the old one', () => {
    const first = service.buildFromTermStreams(new Map([[1, ['alpha']]]));
    const second = service.buildFromTermStreams(new Map([[2, ['beta']]]));

    expect(service.getSnapshot()).toBe(second);
    expect(first.inverted.getPostings('alpha')).toEqual([1]);
    expect(first.inverted.has('beta')).toBe(false);
    expect(second.inverted.has('alpha')).toBe(false);
  });

  it('should honour explicit k-gram settings', () => {
    const snapshot = service.buildFromTermStreams(new Map([[1, ['cat']]]), {
      size: 3,
      boundary: '#',
    });
    expect(snapshot.kgram.getTerms('#ca')).toEqual(['cat']);
  });
});
