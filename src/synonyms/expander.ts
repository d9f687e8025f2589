// Расширение запроса связанными терминами.
import { normalizeText } from '../text/index.js';
import type { SynonymTable } from './table.js';

/**
 * Возвращает список терминов: сначала весь нормализованный запрос, затем
 * связанные термины каждого слова (в порядке слов, затем в порядке таблицы),
 * без повторов.
 *
 * Размер результата ограничен только веером таблицы: каждое слово запроса
 * добавляет не больше своих связанных терминов.
 */
export function expandQuery(query: string, table: SynonymTable): string[] {
  const normalized = normalizeText(query);
  const expanded = [normalized];
  const seen = new Set(expanded);

  for (const token of normalized.split(' ')) {
    for (const related of table.get(token) ?? []) {
      if (!seen.has(related)) {
        seen.add(related);
        expanded.push(related);
      }
    }
  }

  return expanded;
}
