// Таблица связанных терминов для расширения запроса.
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { normalizeText } from '../text/index.js';

// Нормализованный термин → связанные нормализованные термины (в порядке файла).
export type SynonymTable = ReadonlyMap<string, readonly string[]>;

// Формат файла: { "термин": ["синоним", ...] }.
export const SynonymFileSchema = z.record(z.string(), z.array(z.string()));

// Встроенная таблица, поставляется вместе с пакетом.
export const DEFAULT_SYNONYMS_PATH = fileURLToPath(
  new URL('../../data/synonyms.json', import.meta.url),
);

/**
 * Строит таблицу из сырых записей. Ключи и значения проходят через normalizeText,
 * поэтому поиск не зависит от огласовок и вариантов букв. Записи, чьи ключи
 * совпадают после нормализации, объединяются; пустые и совпадающие с ключом
 * значения отбрасываются.
 */
export function createSynonymTable(entries: Record<string, readonly string[]>): SynonymTable {
  const table = new Map<string, string[]>();

  for (const [term, related] of Object.entries(entries)) {
    const key = normalizeText(term);
    if (!key) {
      continue;
    }

    const values = table.get(key) ?? [];
    for (const candidate of related) {
      const value = normalizeText(candidate);
      if (value && value !== key && !values.includes(value)) {
        values.push(value);
      }
    }
    table.set(key, values);
  }

  return table;
}

// Загружает таблицу из JSON-файла (по умолчанию встроенную).
export async function loadSynonymTable(path: string = DEFAULT_SYNONYMS_PATH): Promise<SynonymTable> {
  const raw = await readFile(path, 'utf-8');
  const entries = SynonymFileSchema.parse(JSON.parse(raw));
  return createSynonymTable(entries);
}
