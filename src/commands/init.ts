// Команда tsearch init — создание индекса транскриптов.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { openSegmentIndex, closeSegmentIndex } from '../storage/index.js';

export const initCommand = new Command('init')
  .description('Create the transcript index (Arabic analyzer and vector mapping)')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const opened = openSegmentIndex(config.elasticsearch);

      try {
        console.log(`Создание индекса ${opened.index.indexName}...`);
        const created = await opened.index.createIndex(config.embeddings.dimensions);
        console.log(created
          ? `Индекс создан (размерность векторов: ${config.embeddings.dimensions}).`
          : 'Индекс уже существует.');
      } finally {
        await closeSegmentIndex(opened);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка инициализации: ${message}`);
      process.exit(1);
    }
  });
