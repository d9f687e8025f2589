// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  ElasticsearchConfigSchema,
  EmbeddingsConfigSchema,
  JinaEmbeddingsSchema,
  OpenAIEmbeddingsSchema,
  QueryBoostsSchema,
  SearchConfigSchema,
  SynonymsConfigSchema,
  IngestConfigSchema,
  findBoostOrderingIssues,
} from './schema.js';

export type {
  AppConfig,
  ElasticsearchConfig,
  EmbeddingsConfig,
  JinaEmbeddingsConfig,
  OpenAIEmbeddingsConfig,
  QueryBoosts,
  SearchConfig,
  SynonymsConfig,
  IngestConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export { loadConfig, parseConfig, resolveConfigPath, resolveEnvVars, deepMerge } from './loader.js';
