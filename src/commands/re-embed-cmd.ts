// Команда tsearch re-embed — векторы для документов, у которых их нет.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { openSegmentIndex, closeSegmentIndex } from '../storage/index.js';
import { createTextEmbedder } from '../embeddings/index.js';
import { ConsoleProgress, EmbeddingBackfill } from '../ingest/index.js';

export const reEmbedCommand = new Command('re-embed')
  .description('Generate embeddings for indexed segments with missing vectors')
  .option('--force', 'Re-embed all segments (including existing)')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { force?: boolean; config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const embedder = createTextEmbedder(config.embeddings);
      if (!embedder) {
        throw new Error('Embeddings provider is not configured (embeddings.provider: none)');
      }

      const opened = openSegmentIndex(config.elasticsearch);
      try {
        if (!(await opened.index.exists())) {
          throw new Error(`Index "${opened.index.indexName}" does not exist, run "tsearch init" first`);
        }

        console.log(`Перегенерация эмбеддингов (${config.embeddings.provider})...`);
        const backfill = new EmbeddingBackfill(opened.index, embedder, config.ingest, new ConsoleProgress());
        const result = await backfill.run({ force: options.force ?? false });
        if (result.failed > 0) {
          process.exitCode = 1;
        }
      } finally {
        await closeSegmentIndex(opened);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
