import { describe, it, expect } from 'vitest';
import { buildIndexMappings, segmentFromSource, segmentToDocument, sourceHasVector } from '../schema.js';

describe('buildIndexMappings', () => {
  it('задаёт dense_vector нужной размерности и арабский анализатор', () => {
    const { settings, mappings } = buildIndexMappings(768);

    expect(mappings.properties?.['vector']).toEqual({
      type: 'dense_vector',
      dims: 768,
      index: true,
      similarity: 'cosine',
    });
    expect(mappings.properties?.['processed_text']).toEqual({ type: 'text', analyzer: 'arabic' });
    expect(mappings.properties?.['group_id']).toEqual({ type: 'keyword' });
    expect(settings.analysis?.analyzer?.['arabic']).toEqual({
      type: 'custom',
      tokenizer: 'standard',
      filter: ['lowercase', 'arabic_normalization', 'arabic_stem'],
    });
  });
});

describe('segmentFromSource', () => {
  it('берёт id из doc_id и переводит поля в доменный вид', () => {
    const segment = segmentFromSource('es-id', {
      text: 'نص',
      start: '12.5',
      end: 20,
      video_link: 'abc123',
      group_id: 17,
      sequence: 2,
      doc_id: 'abc123:4',
      is_follow_up: false,
      segment_index: 4,
      vector: [1, 2],
    });

    expect(segment).toEqual({
      id: 'abc123:4',
      text: 'نص',
      start: 12.5,
      end: 20,
      videoReference: 'abc123',
      groupId: '17',
      sequence: 2,
      isFollowUp: false,
      segmentIndex: 4,
    });
  });

  it('без doc_id использует _id, некорректные поля отбрасываются', () => {
    expect(segmentFromSource('es-id', { text: 5, start: 'abc' })).toEqual({ id: 'es-id', text: '' });
    expect(segmentFromSource('es-id', undefined)).toEqual({ id: 'es-id', text: '' });
  });
});

describe('segmentToDocument', () => {
  it('обратно собирает документ без пустых полей', () => {
    const document = segmentToDocument(
      { id: 'v:0', text: 'نص', processedText: 'نص', start: 0, end: 15, videoReference: 'v', segmentIndex: 0 },
      [0.1, 0.2],
    );

    expect(document).toEqual({
      text: 'نص',
      doc_id: 'v:0',
      processed_text: 'نص',
      start: 0,
      end: 15,
      video_link: 'v',
      segment_index: 0,
      vector: [0.1, 0.2],
    });
  });
});

describe('sourceHasVector', () => {
  it('проверяет наличие непустого вектора', () => {
    expect(sourceHasVector({ vector: [1] })).toBe(true);
    expect(sourceHasVector({ vector: [] })).toBe(false);
    expect(sourceHasVector({ text: 'x' })).toBe(false);
    expect(sourceHasVector(null)).toBe(false);
  });
});
