// Команда tsearch ingest — загрузка транскриптов из директории.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { openSegmentIndex, closeSegmentIndex } from '../storage/index.js';
import { createTextEmbedder } from '../embeddings/index.js';
import { ConsoleProgress, SegmentIngester, scanTranscriptFiles } from '../ingest/index.js';

export const ingestCommand = new Command('ingest')
  .description('Index transcript JSON files from a directory')
  .argument('<dir>', 'Directory with transcript files')
  .option('-p, --pattern <glob...>', 'Glob patterns relative to <dir> (default: **/*.json)')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (dir: string, options: { pattern?: string[]; config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const opened = openSegmentIndex(config.elasticsearch);

      try {
        if (await opened.index.createIndex(config.embeddings.dimensions)) {
          console.log(`Индекс ${opened.index.indexName} создан.`);
        }

        const embedder = createTextEmbedder(config.embeddings);
        if (!embedder) {
          console.log('Провайдер эмбеддингов не настроен, сегменты индексируются без векторов.');
        }

        const files = await scanTranscriptFiles(dir, options.pattern);
        if (files.length === 0) {
          console.log('Файлы транскриптов не найдены.');
          return;
        }

        const ingester = new SegmentIngester(opened.index, embedder, config.ingest, new ConsoleProgress());
        const result = await ingester.ingestFiles(files);
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
