// Гибридный запрос: векторная близость поверх лексического запроса.
import type { estypes } from '@elastic/elasticsearch';
import { SEGMENT_FIELDS } from '../storage/schema.js';
import { isZeroVector } from './similarity.js';

// Вес векторной клаузы по умолчанию (у лексической клаузы вес 1).
const DEFAULT_SEMANTIC_BOOST = 2.0;

export interface HybridQueryOptions {
  semanticBoost?: number;
  vectorField?: string;
}

export interface HybridQuery {
  query: estypes.QueryDslQueryContainer;
  // Лексическая часть; по ней считается total в режиме semantic.
  lexical: estypes.QueryDslQueryContainer;
  vectorApplied: boolean;
}

/**
 * Добавляет к лексическому запросу script_score по косинусной близости.
 * Без эмбеддинга (или с нулевым вектором) возвращает тот же объект запроса.
 * Документы без вектора находятся через лексическую клаузу.
 */
export function buildHybridQuery(
  lexical: estypes.QueryDslQueryContainer,
  embedding: readonly number[] | null,
  options: HybridQueryOptions = {},
): HybridQuery {
  if (!embedding || embedding.length === 0 || isZeroVector(embedding)) {
    return { query: lexical, lexical, vectorApplied: false };
  }

  const vectorField = options.vectorField ?? SEGMENT_FIELDS.vector;
  const semanticBoost = options.semanticBoost ?? DEFAULT_SEMANTIC_BOOST;

  const query: estypes.QueryDslQueryContainer = {
    bool: {
      should: [
        {
          script_score: {
            query: { exists: { field: vectorField } },
            script: {
              source: `cosineSimilarity(params.query_vector, '${vectorField}') + 1.0`,
              params: { query_vector: [...embedding] },
            },
            boost: semanticBoost,
          },
        },
        lexical,
      ],
      minimum_should_match: 1,
    },
  };

  return { query, lexical, vectorApplied: true };
}
