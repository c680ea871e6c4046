import { registerAs } from '@nestjs/config';

export interface RetrievalConfig {
  kgram: {
    size: number;
    boundary: string;
  };
  defaultAnalyzer: string;
  corpus: {
    directory: string;
    extension: string;
  };
  suggest: {
    maxDistance: number;
    limit: number;
  };
}

// unset or non-numeric falls back; 0 is kept
const intFromEnv = (name: string, fallback: number): number => {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default registerAs(
  'retrieval',
  (): RetrievalConfig => ({
    kgram: {
      size: intFromEnv('KGRAM_SIZE', 2),
      boundary: process.env.KGRAM_BOUNDARY || '$',
    },
    defaultAnalyzer: process.env.DEFAULT_ANALYZER || 'standard',
    corpus: {
      directory: process.env.CORPUS_DIR || 'documents',
      extension: process.env.CORPUS_EXTENSION || 'txt',
    },
    suggest: {
      maxDistance: intFromEnv('SUGGEST_MAX_DISTANCE', 2),
      limit: intFromEnv('SUGGEST_LIMIT', 10),
    },
  }),
);
