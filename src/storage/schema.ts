// Схема документов индекса транскриптов.
import type { estypes } from '@elastic/elasticsearch';

// Документ сегмента в том виде, в котором он лежит в индексе.
export interface SegmentDocument {
  text: string;
  processed_text?: string;
  start?: number;
  end?: number;
  video_link?: string;
  vector?: number[];
  group_id?: string;
  sequence?: number;
  question?: string;
  answer?: string;
  doc_id?: string;
  is_follow_up?: boolean;
  segment_index?: number;
}

// Имена полей индекса.
export const SEGMENT_FIELDS = {
  text: 'text',
  processedText: 'processed_text',
  start: 'start',
  end: 'end',
  videoLink: 'video_link',
  vector: 'vector',
  groupId: 'group_id',
  sequence: 'sequence',
  docId: 'doc_id',
} as const;

// Сегмент транскрипта в доменном виде.
export interface Segment {
  id: string;
  text: string;
  start?: number;
  end?: number;
  videoReference?: string;
  groupId?: string;
  sequence?: number;
  question?: string;
  answer?: string;
  isFollowUp?: boolean;
  processedText?: string;
  segmentIndex?: number;
}

// Маппинг и настройки индекса: арабский анализатор и dense_vector.
export function buildIndexMappings(dimensions: number): {
  settings: estypes.IndicesIndexSettings;
  mappings: estypes.MappingTypeMapping;
} {
  return {
    settings: {
      analysis: {
        analyzer: {
          arabic: {
            type: 'custom',
            tokenizer: 'standard',
            filter: ['lowercase', 'arabic_normalization', 'arabic_stem'],
          },
        },
      },
    },
    mappings: {
      properties: {
        text: { type: 'text', analyzer: 'arabic' },
        processed_text: { type: 'text', analyzer: 'arabic' },
        start: { type: 'float' },
        end: { type: 'float' },
        video_link: { type: 'keyword' },
        vector: { type: 'dense_vector', dims: dimensions, index: true, similarity: 'cosine' },
        group_id: { type: 'keyword' },
        sequence: { type: 'integer' },
        question: { type: 'text', analyzer: 'arabic' },
        answer: { type: 'text', analyzer: 'arabic' },
        doc_id: { type: 'keyword' },
        is_follow_up: { type: 'boolean' },
        segment_index: { type: 'integer' },
      },
    },
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Собирает Segment из _id и _source документа.
 * id берётся из doc_id, если он сохранён, иначе из _id.
 * Числовые поля, сохранённые строками, приводятся к числам.
 */
export function segmentFromSource(id: string, source: unknown): Segment {
  const doc = isRecord(source) ? source : {};
  const groupId = doc['group_id'];
  const isFollowUp = doc['is_follow_up'];

  return {
    id: optionalString(doc['doc_id']) ?? id,
    text: optionalString(doc['text']) ?? '',
    start: optionalNumber(doc['start']),
    end: optionalNumber(doc['end']),
    videoReference: optionalString(doc['video_link']),
    groupId: typeof groupId === 'number' ? String(groupId) : optionalString(groupId),
    sequence: optionalNumber(doc['sequence']),
    question: optionalString(doc['question']),
    answer: optionalString(doc['answer']),
    isFollowUp: typeof isFollowUp === 'boolean' ? isFollowUp : undefined,
    processedText: optionalString(doc['processed_text']),
    segmentIndex: optionalNumber(doc['segment_index']),
  };
}

// Обратное преобразование: Segment (и, возможно, вектор) в документ индекса.
export function segmentToDocument(segment: Segment, vector?: number[]): SegmentDocument {
  const doc: SegmentDocument = { text: segment.text, doc_id: segment.id };

  if (segment.processedText !== undefined) doc.processed_text = segment.processedText;
  if (segment.start !== undefined) doc.start = segment.start;
  if (segment.end !== undefined) doc.end = segment.end;
  if (segment.videoReference !== undefined) doc.video_link = segment.videoReference;
  if (segment.groupId !== undefined) doc.group_id = segment.groupId;
  if (segment.sequence !== undefined) doc.sequence = segment.sequence;
  if (segment.question !== undefined) doc.question = segment.question;
  if (segment.answer !== undefined) doc.answer = segment.answer;
  if (segment.isFollowUp !== undefined) doc.is_follow_up = segment.isFollowUp;
  if (segment.segmentIndex !== undefined) doc.segment_index = segment.segmentIndex;
  if (vector !== undefined) doc.vector = vector;

  return doc;
}

// Есть ли у сохранённого документа непустой вектор.
export function sourceHasVector(source: unknown): boolean {
  if (!isRecord(source)) {
    return false;
  }
  const vector = source['vector'];
  return Array.isArray(vector) && vector.length > 0;
}
