// Команда tsearch search — поиск по транскриптам из командной строки.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { openSegmentIndex, closeSegmentIndex } from '../storage/index.js';
import { createSearchOrchestrator } from '../search/index.js';
import { formatSearchResponse } from '../results/index.js';

export const searchCommand = new Command('search')
  .description('Search transcripts (lexical, enhanced or semantic)')
  .argument('<query...>', 'Search query')
  .option('-n, --size <number>', 'Number of results')
  .option('-m, --mode <mode>', 'Search mode: lexical, enhanced, semantic')
  .option('-g, --group', 'Group results into question/answer conversations')
  .option('--json', 'Print the raw response as JSON')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (queryWords: string[], options: {
    size?: string;
    mode?: string;
    group?: boolean;
    json?: boolean;
    config?: string;
  }) => {
    try {
      const config = await loadConfig(options.config);
      const opened = openSegmentIndex(config.elasticsearch);

      try {
        const orchestrator = await createSearchOrchestrator(config, opened.index);
        const response = await orchestrator.search({
          query: queryWords.join(' '),
          size: options.size,
          mode: options.mode,
          group: options.group ?? false,
        });

        if (options.json) {
          console.log(JSON.stringify(response, null, 2));
        } else {
          for (const line of formatSearchResponse(response)) {
            console.log(line);
          }
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
