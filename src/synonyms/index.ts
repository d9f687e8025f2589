// Barrel-файл модуля синонимов.
export type { SynonymTable } from './table.js';
export {
  SynonymFileSchema,
  DEFAULT_SYNONYMS_PATH,
  createSynonymTable,
  loadSynonymTable,
} from './table.js';

export { expandQuery } from './expander.js';
