// Режимы поиска и лестница деградации.
import { z } from 'zod';
import { ValidationError } from './errors.js';

export const SEARCH_MODES = ['lexical', 'enhanced', 'semantic'] as const;

export type SearchMode = (typeof SEARCH_MODES)[number];

export const SearchModeSchema = z.enum(SEARCH_MODES);

// Следующий, более простой режим. null, если деградировать некуда.
const DEGRADATION: Record<SearchMode, SearchMode | null> = {
  semantic: 'enhanced',
  enhanced: 'lexical',
  lexical: null,
};

export function nextSimplerMode(mode: SearchMode): SearchMode | null {
  return DEGRADATION[mode];
}

/**
 * Разбирает режим из запроса. Отсутствующее значение даёт fallback,
 * неизвестная строка — ValidationError.
 */
export function parseSearchMode(value: unknown, fallback: SearchMode): SearchMode {
  if (value === undefined || value === null) {
    return fallback;
  }

  const parsed = SearchModeSchema.safeParse(typeof value === 'string' ? value.trim().toLowerCase() : value);
  if (!parsed.success) {
    throw new ValidationError(
      `Unknown search mode: ${String(value)}. Expected one of: ${SEARCH_MODES.join(', ')}`,
    );
  }

  return parsed.data;
}
