#!/usr/bin/env node

// Точка входа CLI поиска по транскриптам.
import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { ingestCommand } from './commands/ingest-cmd.js';
import { reEmbedCommand } from './commands/re-embed-cmd.js';
import { searchCommand } from './commands/search-cmd.js';
import { statusCommand } from './commands/status-cmd.js';

const program = new Command()
  .name('tsearch')
  .description('Hybrid lexical and semantic search over lecture transcripts')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(ingestCommand);
program.addCommand(reEmbedCommand);
program.addCommand(searchCommand);
program.addCommand(statusCommand);

program.parse();
