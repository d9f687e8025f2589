// Построение лексического запроса из нескольких стратегий сопоставления.
import type { estypes } from '@elastic/elasticsearch';
import type { QueryBoosts } from '../config/schema.js';
import { SEGMENT_FIELDS } from '../storage/schema.js';

export interface LexicalQueryOptions {
  boosts: QueryBoosts;
  // Сколько первых синонимов получают вес synonymEarly.
  earlySynonymCount: number;
  textField?: string;
  normalizedField?: string;
}

// Экранирует метасимволы wildcard-запроса.
export function escapeWildcard(term: string): string {
  return term.replace(/[\\*?]/g, (char) => `\\${char}`);
}

/**
 * Составной запрос: фраза, все слова, нечёткое совпадение, синонимы,
 * поиск по двум полям, подстрока и (для нескольких слов) каждое слово отдельно.
 * Достаточно совпасть хотя бы одной клаузе.
 *
 * @param rawTerm - запрос пользователя как есть
 * @param expanded - результат expandQuery; первый элемент (сам запрос) пропускается
 */
export function buildLexicalQuery(
  rawTerm: string,
  expanded: readonly string[],
  options: LexicalQueryOptions,
): estypes.QueryDslQueryContainer {
  const term = rawTerm.trim();
  const textField = options.textField ?? SEGMENT_FIELDS.text;
  const normalizedField = options.normalizedField ?? SEGMENT_FIELDS.processedText;
  const { boosts } = options;

  const should: estypes.QueryDslQueryContainer[] = [
    { match_phrase: { [textField]: { query: term, boost: boosts.phrase } } },
    { match: { [textField]: { query: term, operator: 'and', boost: boosts.allTerms } } },
    { match: { [textField]: { query: term, fuzziness: 'AUTO', boost: boosts.fuzzy } } },
  ];

  expanded.slice(1).forEach((synonym, index) => {
    const boost = index < options.earlySynonymCount ? boosts.synonymEarly : boosts.synonymLate;
    should.push({ match: { [textField]: { query: synonym, boost } } });
  });

  should.push(
    {
      multi_match: {
        query: term,
        fields: [`${textField}^3`, `${normalizedField}^2`],
        type: 'best_fields',
        boost: boosts.crossField,
      },
    },
    { wildcard: { [textField]: { value: `*${escapeWildcard(term)}*`, boost: boosts.substring } } },
  );

  const words = term.split(/\s+/).filter((word) => word.length > 0);
  if (words.length > 1) {
    should.push({
      bool: {
        must: words.map((word) => ({ match: { [textField]: word } })),
        boost: boosts.allWords,
      },
    });
  }

  return { bool: { should, minimum_should_match: 1 } };
}

// Запрос режима lexical: одно совпадение по тексту.
export function buildBasicQuery(
  rawTerm: string,
  textField: string = SEGMENT_FIELDS.text,
): estypes.QueryDslQueryContainer {
  return { match: { [textField]: rawTerm.trim() } };
}
