import { describe, it, expect } from 'vitest';
import { ResultAggregator, groupFetchSize } from '../aggregator.js';
import type { ScoredHit } from '../../search/types.js';
import type { Segment } from '../../storage/schema.js';
import { FakeSegmentIndex } from '../../search/__tests__/fake-index.js';

function hit(segment: Segment, score: number): ScoredHit {
  return { segment, score, sourceMode: 'enhanced' };
}

describe('ResultAggregator.flatten', () => {
  it('сохраняет порядок и оценки выдачи', () => {
    const aggregator = new ResultAggregator(new FakeSegmentIndex());

    const results = aggregator.flatten([
      hit({ id: 'b', text: 'ب', start: 10, videoReference: 'vid1' }, 3),
      hit({ id: 'a', text: 'ا', start: 125, end: 130, videoReference: 'https://youtu.be/vid2' }, 1.5),
    ]);

    expect(results.map((result) => [result.id, result.score, result.start, result.deepLink])).toEqual([
      ['b', 3, '00:10', 'https://www.youtube.com/watch?v=vid1&t=10s'],
      ['a', 1.5, '02:05', 'https://www.youtube.com/watch?v=vid2&t=125s'],
    ]);
    expect(results[0]?.end).toBe('00:00');
  });
});

describe('ResultAggregator.groupHits', () => {
  it('без групп возвращает пустой список и не обращается к индексу', async () => {
    const index = new FakeSegmentIndex();
    const aggregator = new ResultAggregator(index);

    const groups = await aggregator.groupHits([hit({ id: 'a', text: 'x' }, 1)]);

    expect(groups).toEqual([]);
    expect(index.searchCalls).toHaveLength(0);
  });

  it('догружает группы, сортирует по sequence и помечает найденные сегменты', async () => {
    const index = new FakeSegmentIndex()
      .add('q1', { text: 'سؤال', group_id: 'conv-2', sequence: 0, doc_id: 'q1', question: 'سؤال' })
      .add('a1', { text: 'جواب', group_id: 'conv-2', sequence: 1, doc_id: 'a1', answer: 'جواب' })
      .add('f1', { text: 'متابعة', group_id: 'conv-2', sequence: 2, doc_id: 'f1', is_follow_up: true })
      .add('x1', { text: 'اخر', group_id: 'conv-1', sequence: 3, doc_id: 'x1' })
      .add('x0', { text: 'بدون ترتيب', group_id: 'conv-1', doc_id: 'x0' })
      .add('z1', { text: 'غير مطلوب', group_id: 'conv-9', sequence: 0, doc_id: 'z1' });
    const aggregator = new ResultAggregator(index);

    const groups = await aggregator.groupHits([
      hit({ id: 'a1', text: 'جواب', groupId: 'conv-2', sequence: 1 }, 8),
      hit({ id: 'x1', text: 'اخر', groupId: 'conv-1', sequence: 3 }, 6),
      hit({ id: 'f1', text: 'متابعة', groupId: 'conv-2', sequence: 2 }, 2),
    ]);

    // Группы в порядке первого появления в выдаче.
    expect(groups.map((group) => group.groupId)).toEqual(['conv-2', 'conv-1']);
    expect(groups[0]?.items.map((item) => [item.id, item.isMatch, item.matchScore])).toEqual([
      ['q1', false, 0],
      ['a1', true, 8],
      ['f1', true, 2],
    ]);
    expect(groups[0]?.items[0]?.question).toBe('سؤال');
    expect(groups[0]?.items[2]?.isFollowUp).toBe(true);
    // Сегмент без sequence считается нулевым.
    expect(groups[1]?.items.map((item) => item.id)).toEqual(['x0', 'x1']);

    expect(index.searchCalls[0]).toEqual({
      query: { terms: { group_id: ['conv-2', 'conv-1'] } },
      size: 100,
      sort: [
        { group_id: { order: 'asc', unmapped_type: 'keyword' } },
        { sequence: { order: 'asc', missing: '_first', unmapped_type: 'long' } },
      ],
      signal: undefined,
    });
  });

  it('при пустой догрузке группа состоит из найденных сегментов', async () => {
    const aggregator = new ResultAggregator(new FakeSegmentIndex());

    const groups = await aggregator.groupHits([
      hit({ id: 'b', text: 'ب', groupId: 'g', sequence: 5 }, 2),
      hit({ id: 'a', text: 'ا', groupId: 'g', sequence: 1 }, 4),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0]?.items.map((item) => [item.id, item.matchScore])).toEqual([
      ['a', 4],
      ['b', 2],
    ]);
  });
});

describe('groupFetchSize', () => {
  it('не меньше 100 и не больше 10 000', () => {
    expect(groupFetchSize(1)).toBe(100);
    expect(groupFetchSize(25)).toBe(250);
    expect(groupFetchSize(5000)).toBe(10_000);
  });
});
