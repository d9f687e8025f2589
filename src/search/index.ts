// Barrel-файл модуля поиска.
export type {
  SearchRequest,
  ScoredHit,
  SearchResponse,
  FlatSearchResponse,
  GroupedSearchResponse,
} from './types.js';

export type { SearchMode } from './modes.js';
export { SEARCH_MODES, SearchModeSchema, nextSimplerMode, parseSearchMode } from './modes.js';

export type { FailureStatus, SearchErrorKind, SearchFailure } from './errors.js';
export {
  SearchError,
  ValidationError,
  ConnectivityError,
  AuthenticationError,
  NotFoundError,
  TimeoutError,
  EmbeddingUnavailableError,
  RequestCancelledError,
  isSearchError,
  classifyIndexError,
  toSearchFailure,
} from './errors.js';

export type { LexicalQueryOptions } from './query-builder.js';
export { buildLexicalQuery, buildBasicQuery, escapeWildcard } from './query-builder.js';

export type { HybridQuery, HybridQueryOptions } from './hybrid.js';
export { buildHybridQuery } from './hybrid.js';
export { vectorNorm, isZeroVector } from './similarity.js';

export type { SearchOrchestratorOptions } from './orchestrator.js';
export { SearchOrchestrator, clampSize } from './orchestrator.js';
export { createSearchOrchestrator } from './factory.js';
