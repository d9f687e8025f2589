// Команда tsearch status — состояние кластера и индекса.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { openSegmentIndex, closeSegmentIndex, getIndexStatus } from '../storage/index.js';

export const statusCommand = new Command('status')
  .description('Show cluster, index and configuration status')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const opened = openSegmentIndex(config.elasticsearch);

      try {
        const status = await getIndexStatus(opened.index);

        console.log('');
        console.log('=== Статус transcript-search ===');
        console.log('');
        if (status.connected) {
          console.log(`Кластер:   ${status.clusterName} (Elasticsearch ${status.version})`);
          console.log(`Индекс:    ${status.index}${status.exists ? '' : ' (не создан)'}`);
          console.log(`Сегменты:  ${status.documents ?? 0}`);
        } else {
          console.log(`Кластер:   недоступен (${config.elasticsearch.node})`);
          console.log(`Индекс:    ${status.index}`);
          process.exitCode = 1;
        }
        console.log('');
        console.log(`Провайдер эмбеддингов: ${config.embeddings.provider} (${config.embeddings.dimensions})`);
        console.log(`Режим поиска по умолчанию: ${config.search.defaultMode}`);
        console.log(`Размер выдачи: ${config.search.defaultSize} (максимум ${config.search.maxSize})`);
      } finally {
        await closeSegmentIndex(opened);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
