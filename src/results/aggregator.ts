// Сборка ответа: плоский список или группы диалога с контекстом.
import type { estypes } from '@elastic/elasticsearch';
import { SEGMENT_FIELDS, segmentFromSource } from '../storage/schema.js';
import type { Segment } from '../storage/schema.js';
import type { SegmentIndex } from '../storage/types.js';
import type { ScoredHit } from '../search/types.js';
import { formatTimestamp, toWholeSeconds } from './time.js';
import { buildDeepLink } from './video-link.js';
import type { ConversationGroup, GroupItem, SegmentResult } from './types.js';

// Сколько сегментов догружать на одну группу и пределы выборки.
const SEGMENTS_PER_GROUP = 10;
const MIN_GROUP_FETCH = 100;
const MAX_GROUP_FETCH = 10_000;

const GROUP_SORT: estypes.Sort = [
  { [SEGMENT_FIELDS.groupId]: { order: 'asc', unmapped_type: 'keyword' } },
  { [SEGMENT_FIELDS.sequence]: { order: 'asc', missing: '_first', unmapped_type: 'long' } },
];

function formatSegment(segment: Segment): Omit<SegmentResult, 'score'> {
  const videoReference = segment.videoReference ?? '';
  return {
    id: segment.id,
    text: segment.text,
    start: formatTimestamp(segment.start),
    end: formatTimestamp(segment.end),
    startSeconds: toWholeSeconds(segment.start),
    endSeconds: toWholeSeconds(segment.end),
    videoReference,
    deepLink: buildDeepLink(videoReference, segment.start),
    groupId: segment.groupId,
    sequence: segment.sequence,
    question: segment.question,
    answer: segment.answer,
    isFollowUp: segment.isFollowUp,
  };
}

export function toSegmentResult(hit: ScoredHit): SegmentResult {
  return { ...formatSegment(hit.segment), score: hit.score };
}

// Размер догрузки для заданного числа групп.
export function groupFetchSize(groupCount: number): number {
  return Math.min(MAX_GROUP_FETCH, Math.max(MIN_GROUP_FETCH, groupCount * SEGMENTS_PER_GROUP));
}

// Стабильная сортировка по sequence; отсутствующий sequence считается 0.
function sortBySequence(segments: Segment[]): Segment[] {
  return [...segments].sort((a, b) => (a.sequence ?? 0) - (b.sequence ?? 0));
}

export class ResultAggregator {
  constructor(private index: SegmentIndex) {}

  // Плоский список в порядке выдачи.
  flatten(hits: ScoredHit[]): SegmentResult[] {
    return hits.map(toSegmentResult);
  }

  /**
   * Группирует найденные сегменты в диалоги.
   * Догружает все сегменты найденных групп, сортирует каждую группу по sequence
   * и помечает найденные сегменты. Группы идут в порядке первого появления в выдаче.
   * Идентификаторы групп сравниваются точно, с учётом регистра.
   */
  async groupHits(hits: ScoredHit[], signal?: AbortSignal): Promise<ConversationGroup[]> {
    const groupIds: string[] = [];
    const seenGroups = new Set<string>();
    const matchScores = new Map<string, number>();
    const hitsByGroup = new Map<string, Segment[]>();

    for (const hit of hits) {
      if (!matchScores.has(hit.segment.id)) {
        matchScores.set(hit.segment.id, hit.score);
      }

      const groupId = hit.segment.groupId;
      if (!groupId) {
        continue;
      }
      if (!seenGroups.has(groupId)) {
        seenGroups.add(groupId);
        groupIds.push(groupId);
        hitsByGroup.set(groupId, []);
      }
      hitsByGroup.get(groupId)?.push(hit.segment);
    }

    if (groupIds.length === 0) {
      return [];
    }

    const response = await this.index.search({
      query: { terms: { [SEGMENT_FIELDS.groupId]: groupIds } },
      size: groupFetchSize(groupIds.length),
      sort: GROUP_SORT,
      signal,
    });

    const members = new Map<string, Segment[]>();
    for (const fetched of response.hits) {
      const segment = segmentFromSource(fetched.id, fetched.source);
      const groupId = segment.groupId;
      // Сегменты вне запрошенных групп игнорируются.
      if (!groupId || !seenGroups.has(groupId)) {
        continue;
      }
      const list = members.get(groupId) ?? [];
      list.push(segment);
      members.set(groupId, list);
    }

    return groupIds.map((groupId) => {
      // Если догрузка ничего не вернула для группы, показываем хотя бы найденные сегменты.
      const segments = members.get(groupId) ?? hitsByGroup.get(groupId) ?? [];
      const items: GroupItem[] = sortBySequence(segments).map((segment) => {
        const score = matchScores.get(segment.id);
        return {
          ...formatSegment(segment),
          isMatch: score !== undefined,
          matchScore: score ?? 0,
        };
      });
      return { groupId, items };
    });
  }
}
