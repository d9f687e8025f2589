import { z } from 'zod';
import { SEARCH_MODES } from '../search/modes.js';

// Схема подключения к Elasticsearch.
export const ElasticsearchConfigSchema = z.object({
  node: z.string().url().default('http://localhost:9200'),
  apiKey: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  index: z.string().min(1).default('transcription'),
  // Таймаут одного запроса к индексу (не всего поискового запроса).
  requestTimeoutMs: z.number().int().positive().default(30_000),
});

// Схема Jina Embeddings.
export const JinaEmbeddingsSchema = z.object({
  apiKey: z.string(),
  model: z.string().default('jina-embeddings-v3'),
});

// Схема OpenAI Embeddings.
export const OpenAIEmbeddingsSchema = z.object({
  apiKey: z.string(),
  model: z.string().default('text-embedding-3-small'),
});

// Схема конфигурации эмбеддингов.
export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['jina', 'openai', 'mock', 'none']).default('none'),
  // Размерность векторов в индексе; провайдер обязан отдавать ровно столько.
  dimensions: z.number().int().positive().default(768),
  // Сколько ждать эмбеддинг запроса, прежде чем перейти на лексический поиск.
  timeoutMs: z.number().int().positive().default(10_000),
  jina: JinaEmbeddingsSchema.optional(),
  openai: OpenAIEmbeddingsSchema.optional(),
});

// Веса клауз лексического запроса.
const QueryBoostsShape = z.object({
  phrase: z.number().positive().default(5.0),
  allTerms: z.number().positive().default(3.0),
  synonymEarly: z.number().positive().default(2.8),
  crossField: z.number().positive().default(2.5),
  fuzzy: z.number().positive().default(2.2),
  allWords: z.number().positive().default(2.0),
  synonymLate: z.number().positive().default(1.5),
  substring: z.number().positive().default(1.2),
});

export const QueryBoostsSchema = QueryBoostsShape.superRefine((boosts, ctx) => {
  for (const issue of findBoostOrderingIssues(boosts)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue });
  }
});

// Схема параметров поиска.
export const SearchConfigSchema = z.object({
  defaultSize: z.number().int().positive().default(50),
  maxSize: z.number().int().positive().default(1000),
  defaultMode: z.enum(SEARCH_MODES).default('enhanced'),
  // Вес векторной клаузы относительно лексического запроса (у него вес 1).
  semanticBoost: z.number().positive().default(2.0),
  // Сколько первых синонимов получают повышенный вес.
  earlySynonymCount: z.number().int().min(0).default(3),
  boosts: QueryBoostsSchema.default({}),
});

// Схема таблицы синонимов.
export const SynonymsConfigSchema = z.object({
  // Путь к JSON-файлу; без него используется встроенная таблица.
  path: z.string().optional(),
});

// Схема параметров загрузки транскриптов.
export const IngestConfigSchema = z.object({
  minDuration: z.number().nonnegative().default(15),
  maxDuration: z.number().positive().default(120),
  embedBatchSize: z.number().int().positive().default(32),
  bulkBatchSize: z.number().int().positive().default(500),
});

// Корневая схема конфигурации приложения.
export const AppConfigSchema = z.object({
  elasticsearch: ElasticsearchConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  synonyms: SynonymsConfigSchema.default({}),
  ingest: IngestConfigSchema.default({}),
});

// Типы, выведенные из схем.
export type ElasticsearchConfig = z.infer<typeof ElasticsearchConfigSchema>;
export type JinaEmbeddingsConfig = z.infer<typeof JinaEmbeddingsSchema>;
export type OpenAIEmbeddingsConfig = z.infer<typeof OpenAIEmbeddingsSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type QueryBoosts = z.infer<typeof QueryBoostsShape>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type SynonymsConfig = z.infer<typeof SynonymsConfigSchema>;
export type IngestConfig = z.infer<typeof IngestConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Проверяет порядок весов, на котором держится баланс точности и полноты:
 * phrase > allTerms > synonymEarly > crossField > fuzzy > allWords > substring,
 * fuzzy > synonymLate >= substring.
 */
export function findBoostOrderingIssues(boosts: QueryBoosts): string[] {
  const strict: Array<[keyof QueryBoosts, keyof QueryBoosts]> = [
    ['phrase', 'allTerms'],
    ['allTerms', 'synonymEarly'],
    ['synonymEarly', 'crossField'],
    ['crossField', 'fuzzy'],
    ['fuzzy', 'allWords'],
    ['allWords', 'substring'],
    ['fuzzy', 'synonymLate'],
  ];

  const issues: string[] = [];
  for (const [higher, lower] of strict) {
    if (!(boosts[higher] > boosts[lower])) {
      issues.push(`search.boosts.${higher} must be greater than search.boosts.${lower}`);
    }
  }
  if (boosts.synonymLate < boosts.substring) {
    issues.push('search.boosts.synonymLate must not be less than search.boosts.substring');
  }

  return issues;
}
