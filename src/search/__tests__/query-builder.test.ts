import { describe, it, expect } from 'vitest';
import type { estypes } from '@elastic/elasticsearch';
import { buildBasicQuery, buildLexicalQuery, escapeWildcard } from '../query-builder.js';
import { AppConfigSchema, findBoostOrderingIssues } from '../../config/schema.js';
import type { QueryBoosts } from '../../config/schema.js';

const BOOSTS: QueryBoosts = AppConfigSchema.parse({}).search.boosts;

function shouldClauses(query: estypes.QueryDslQueryContainer): estypes.QueryDslQueryContainer[] {
  const should = query.bool?.should;
  if (!Array.isArray(should)) {
    throw new Error('expected bool.should array');
  }
  return should;
}

describe('buildLexicalQuery', () => {
  it('строит клаузы в фиксированном порядке для одного слова', () => {
    const query = buildLexicalQuery('صلاة', ['صلاه', 'صلوات', 'الصلاه'], {
      boosts: BOOSTS,
      earlySynonymCount: 3,
    });

    expect(query.bool?.minimum_should_match).toBe(1);
    expect(shouldClauses(query)).toEqual([
      { match_phrase: { text: { query: 'صلاة', boost: 5.0 } } },
      { match: { text: { query: 'صلاة', operator: 'and', boost: 3.0 } } },
      { match: { text: { query: 'صلاة', fuzziness: 'AUTO', boost: 2.2 } } },
      { match: { text: { query: 'صلوات', boost: 2.8 } } },
      { match: { text: { query: 'الصلاه', boost: 2.8 } } },
      {
        multi_match: {
          query: 'صلاة',
          fields: ['text^3', 'processed_text^2'],
          type: 'best_fields',
          boost: 2.5,
        },
      },
      { wildcard: { text: { value: '*صلاة*', boost: 1.2 } } },
    ]);
  });

  it('после earlySynonymCount синонимы получают пониженный вес', () => {
    const query = buildLexicalQuery('سفر', ['سفر', 'a', 'b', 'c', 'd', 'e'], {
      boosts: BOOSTS,
      earlySynonymCount: 3,
    });

    const synonymBoosts = shouldClauses(query)
      .slice(3, 8)
      .map((clause) => clause.match?.['text']);

    expect(synonymBoosts).toEqual([
      { query: 'a', boost: 2.8 },
      { query: 'b', boost: 2.8 },
      { query: 'c', boost: 2.8 },
      { query: 'd', boost: 1.5 },
      { query: 'e', boost: 1.5 },
    ]);
  });

  it('для нескольких слов добавляет bool.must по каждому слову', () => {
    const query = buildLexicalQuery('  صلاة   السفر ', ['صلاه السفر'], {
      boosts: BOOSTS,
      earlySynonymCount: 3,
    });

    const clauses = shouldClauses(query);
    expect(clauses).toHaveLength(6);
    expect(clauses[0]).toEqual({ match_phrase: { text: { query: 'صلاة   السفر', boost: 5.0 } } });
    expect(clauses[5]).toEqual({
      bool: {
        must: [{ match: { text: 'صلاة' } }, { match: { text: 'السفر' } }],
        boost: 2.0,
      },
    });
  });

  it('экранирует метасимволы wildcard', () => {
    const query = buildLexicalQuery('a*b?c\\', ['a*b?c\\'], { boosts: BOOSTS, earlySynonymCount: 3 });

    const wildcard = shouldClauses(query).find((clause) => clause.wildcard !== undefined);
    expect(wildcard).toEqual({ wildcard: { text: { value: '*a\\*b\\?c\\\\*', boost: 1.2 } } });
  });

  it('использует переданные имена полей', () => {
    const query = buildLexicalQuery('x', ['x'], {
      boosts: BOOSTS,
      earlySynonymCount: 3,
      textField: 'answer',
      normalizedField: 'processed_answer',
    });

    expect(shouldClauses(query)[3]).toEqual({
      multi_match: {
        query: 'x',
        fields: ['answer^3', 'processed_answer^2'],
        type: 'best_fields',
        boost: 2.5,
      },
    });
  });
});

describe('веса клауз по умолчанию', () => {
  it('phrase > allTerms > synonymEarly > crossField > fuzzy > allWords > substring', () => {
    const ordered = [
      BOOSTS.phrase,
      BOOSTS.allTerms,
      BOOSTS.synonymEarly,
      BOOSTS.crossField,
      BOOSTS.fuzzy,
      BOOSTS.allWords,
      BOOSTS.substring,
    ];

    for (let i = 1; i < ordered.length; i++) {
      expect(ordered[i - 1]!).toBeGreaterThan(ordered[i]!);
    }
  });

  it('fuzzy > synonymLate >= substring', () => {
    expect(BOOSTS.fuzzy).toBeGreaterThan(BOOSTS.synonymLate);
    expect(BOOSTS.synonymLate).toBeGreaterThanOrEqual(BOOSTS.substring);
    expect(findBoostOrderingIssues(BOOSTS)).toEqual([]);
  });
});

describe('escapeWildcard', () => {
  it('экранирует *, ? и обратный слэш', () => {
    expect(escapeWildcard('*?\\')).toBe('\\*\\?\\\\');
    expect(escapeWildcard('صلاة')).toBe('صلاة');
  });
});

describe('buildBasicQuery', () => {
  it('строит одиночный match по тексту', () => {
    expect(buildBasicQuery(' صلاة ')).toEqual({ match: { text: 'صلاة' } });
  });
});
