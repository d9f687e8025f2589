// Сборка SearchOrchestrator из конфигурации.
import type { AppConfig } from '../config/schema.js';
import { createTextEmbedder } from '../embeddings/factory.js';
import { ResultAggregator } from '../results/aggregator.js';
import type { SegmentIndex } from '../storage/types.js';
import { loadSynonymTable } from '../synonyms/table.js';
import { SearchOrchestrator } from './orchestrator.js';

export async function createSearchOrchestrator(
  config: AppConfig,
  index: SegmentIndex,
): Promise<SearchOrchestrator> {
  const synonyms = await loadSynonymTable(config.synonyms.path);
  const embedder = createTextEmbedder(config.embeddings);

  return new SearchOrchestrator(index, new ResultAggregator(index), embedder, synonyms, {
    search: config.search,
    embeddingTimeoutMs: config.embeddings.timeoutMs,
  });
}
