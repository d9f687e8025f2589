import type { AppConfig } from './schema.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: AppConfig = {
  elasticsearch: {
    node: 'http://localhost:9200',
    index: 'transcription',
    requestTimeoutMs: 30_000,
  },
  embeddings: {
    provider: 'none',
    dimensions: 768,
    timeoutMs: 10_000,
  },
  search: {
    defaultSize: 50,
    maxSize: 1000,
    defaultMode: 'enhanced',
    semanticBoost: 2.0,
    earlySynonymCount: 3,
    boosts: {
      phrase: 5.0,
      allTerms: 3.0,
      synonymEarly: 2.8,
      crossField: 2.5,
      fuzzy: 2.2,
      allWords: 2.0,
      synonymLate: 1.5,
      substring: 1.2,
    },
  },
  synonyms: {},
  ingest: {
    minDuration: 15,
    maxDuration: 120,
    embedBatchSize: 32,
    bulkBatchSize: 500,
  },
};
