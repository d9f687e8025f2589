// Оркестратор поиска: режим → запрос → count + search → сборка ответа.
import { z } from 'zod';
import type { estypes } from '@elastic/elasticsearch';
import type { SearchConfig } from '../config/schema.js';
import type { TextEmbedder } from '../embeddings/types.js';
import type { ResultAggregator } from '../results/aggregator.js';
import { segmentFromSource } from '../storage/schema.js';
import type { SegmentIndex } from '../storage/types.js';
import type { SynonymTable } from '../synonyms/table.js';
import { expandQuery } from '../synonyms/expander.js';
import { normalizeText } from '../text/normalizer.js';
import {
  EmbeddingUnavailableError,
  RequestCancelledError,
  ValidationError,
  classifyIndexError,
  isSearchError,
  toSearchFailure,
} from './errors.js';
import type { SearchFailure } from './errors.js';
import { buildHybridQuery } from './hybrid.js';
import { nextSimplerMode, parseSearchMode } from './modes.js';
import type { SearchMode } from './modes.js';
import { buildBasicQuery, buildLexicalQuery } from './query-builder.js';
import type { ScoredHit, SearchRequest, SearchResponse } from './types.js';

const QuerySchema = z.string({ invalid_type_error: 'Query must be a string' })
  .trim()
  .min(1, 'Query must not be empty');

// Целое положительное число без знака, записанное строкой.
const INTEGER_STRING = /^\d+$/;

/**
 * Приводит размер выдачи к допустимому: нечисловые, дробные и неположительные
 * значения дают defaultSize, значения больше maxSize обрезаются.
 */
export function clampSize(value: unknown, defaultSize = 50, maxSize = 1000): number {
  let size: number;
  if (typeof value === 'number') {
    size = value;
  } else if (typeof value === 'string' && INTEGER_STRING.test(value.trim())) {
    size = Number(value.trim());
  } else {
    return defaultSize;
  }

  if (!Number.isInteger(size) || size <= 0) {
    return defaultSize;
  }
  return Math.min(size, maxSize);
}

// Запрос, подготовленный для конкретного режима.
interface SearchPlan {
  mode: SearchMode;
  query: estypes.QueryDslQueryContainer;
  countQuery: estypes.QueryDslQueryContainer;
}

export interface SearchOrchestratorOptions {
  search: SearchConfig;
  // Сколько ждать эмбеддинг запроса.
  embeddingTimeoutMs: number;
}

// Отклоняет промис по сигналу, даже если исполнитель сигнал не слушает.
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Выполняет поиск в запрошенном режиме с деградацией:
 * semantic без эмбеддинга работает как enhanced, а сбой соединения или таймаут
 * индекса повторяется один раз в следующем, более простом режиме.
 *
 * total в режиме semantic считается по лексической части запроса, поэтому
 * это оценка; она не бывает меньше returned.
 */
export class SearchOrchestrator {
  private readonly config: SearchConfig;
  private readonly embeddingTimeoutMs: number;

  constructor(
    private index: SegmentIndex,
    private aggregator: ResultAggregator,
    private embedder: TextEmbedder | null,
    private synonyms: SynonymTable,
    options: SearchOrchestratorOptions,
  ) {
    this.config = options.search;
    this.embeddingTimeoutMs = options.embeddingTimeoutMs;
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const startedAt = performance.now();

    const parsedQuery = QuerySchema.safeParse(request.query);
    if (!parsedQuery.success) {
      throw new ValidationError(parsedQuery.error.issues[0]?.message ?? 'Invalid query');
    }
    const query = parsedQuery.data;
    const size = clampSize(request.size, this.config.defaultSize, this.config.maxSize);
    const requestedMode = parseSearchMode(request.mode, this.config.defaultMode);
    const { signal } = request;

    let mode = requestedMode;
    let retried = false;

    for (;;) {
      if (signal?.aborted) {
        throw new RequestCancelledError(undefined, { cause: signal.reason });
      }

      let plan: SearchPlan | null = null;
      try {
        plan = await this.plan(query, mode, signal);
        const hits = await this.execute(plan, size, signal);
        return await this.respond(hits.hits, hits.total, plan.mode, requestedMode, request.group === true, signal, startedAt);
      } catch (error) {
        if (signal?.aborted) {
          throw new RequestCancelledError(undefined, { cause: error });
        }

        const classified = classifyIndexError(error);
        const failedMode = plan?.mode ?? mode;
        const next = nextSimplerMode(failedMode);

        if (isSearchError(classified) && classified.retryable && !retried && next !== null) {
          console.warn(`[search] ${failedMode} search failed (${classified.message}), retrying as ${next}`);
          retried = true;
          mode = next;
          continue;
        }

        throw classified;
      }
    }
  }

  // Граница запроса: ошибки превращаются в SearchFailure.
  async searchSafe(request: SearchRequest): Promise<SearchResponse | SearchFailure> {
    try {
      return await this.search(request);
    } catch (error) {
      return toSearchFailure(error);
    }
  }

  private async plan(query: string, mode: SearchMode, signal?: AbortSignal): Promise<SearchPlan> {
    if (mode === 'lexical') {
      const basic = buildBasicQuery(query);
      return { mode, query: basic, countQuery: basic };
    }

    const normalized = normalizeText(query);
    const lexical = buildLexicalQuery(query, expandQuery(normalized, this.synonyms), {
      boosts: this.config.boosts,
      earlySynonymCount: this.config.earlySynonymCount,
    });

    if (mode === 'enhanced') {
      return { mode, query: lexical, countQuery: lexical };
    }

    const embedding = await this.embedQuery(normalized, signal);
    const hybrid = buildHybridQuery(lexical, embedding, { semanticBoost: this.config.semanticBoost });
    return {
      mode: hybrid.vectorApplied ? 'semantic' : 'enhanced',
      query: hybrid.query,
      countQuery: hybrid.lexical,
    };
  }

  // Эмбеддинг запроса; null, если его нельзя получить (поиск продолжится как enhanced).
  private async embedQuery(normalized: string, signal?: AbortSignal): Promise<number[] | null> {
    const timeout = AbortSignal.timeout(this.embeddingTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      if (!this.embedder) {
        throw new EmbeddingUnavailableError('No embedding provider configured');
      }
      if (normalized === '') {
        throw new EmbeddingUnavailableError('Query has no text to embed after normalization');
      }

      const vector = await raceAbort(this.embedder.embedQuery(normalized, combined), combined);
      if (vector.length !== this.embedder.dimensions) {
        throw new EmbeddingUnavailableError(
          `Query embedding has ${vector.length} dimensions, expected ${this.embedder.dimensions}`,
        );
      }
      return vector;
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestCancelledError(undefined, { cause: error });
      }
      const reason = timeout.aborted ? `timed out after ${this.embeddingTimeoutMs}ms` : describeError(error);
      console.warn(`[search] Query embedding unavailable (${reason}), using enhanced search`);
      return null;
    }
  }

  private async execute(
    plan: SearchPlan,
    size: number,
    signal?: AbortSignal,
  ): Promise<{ hits: ScoredHit[]; total: number }> {
    const [count, result] = await Promise.all([
      this.index.count(plan.countQuery, signal),
      this.index.search({ query: plan.query, size, signal }),
    ]);

    const seen = new Set<string>();
    const hits: ScoredHit[] = [];
    for (const hit of result.hits) {
      const segment = segmentFromSource(hit.id, hit.source);
      if (seen.has(segment.id)) {
        continue;
      }
      seen.add(segment.id);
      hits.push({ segment, score: hit.score ?? 0, sourceMode: plan.mode });
    }

    return { hits, total: Math.max(count, hits.length) };
  }

  private async respond(
    hits: ScoredHit[],
    total: number,
    modeUsed: SearchMode,
    requestedMode: SearchMode,
    group: boolean,
    signal: AbortSignal | undefined,
    startedAt: number,
  ): Promise<SearchResponse> {
    if (group) {
      const groups = await this.aggregator.groupHits(hits, signal);
      return {
        grouped: true,
        results: groups,
        total: groups.length,
        returned: groups.length,
        modeUsed,
        requestedMode,
        queryTimeMs: Math.round(performance.now() - startedAt),
      };
    }

    const results = this.aggregator.flatten(hits);
    return {
      grouped: false,
      results,
      total,
      returned: results.length,
      modeUsed,
      requestedMode,
      queryTimeMs: Math.round(performance.now() - startedAt),
    };
  }
}
