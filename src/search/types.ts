// Типы модуля поиска.
import type { Segment } from '../storage/schema.js';
import type { ConversationGroup, SegmentResult } from '../results/types.js';
import type { SearchMode } from './modes.js';

// Запрос на поиск (как пришёл от клиента, до валидации).
export interface SearchRequest {
  query: string;
  size?: unknown;
  mode?: string;
  group?: boolean;
  signal?: AbortSignal;
}

// Найденный сегмент с оценкой и режимом, в котором он найден.
export interface ScoredHit {
  segment: Segment;
  score: number;
  sourceMode: SearchMode;
}

interface SearchResponseBase {
  // Оценка числа совпадений в индексе (не меньше returned).
  total: number;
  returned: number;
  modeUsed: SearchMode;
  requestedMode: SearchMode;
  queryTimeMs: number;
}

export interface FlatSearchResponse extends SearchResponseBase {
  grouped: false;
  results: SegmentResult[];
}

export interface GroupedSearchResponse extends SearchResponseBase {
  grouped: true;
  results: ConversationGroup[];
}

export type SearchResponse = FlatSearchResponse | GroupedSearchResponse;
