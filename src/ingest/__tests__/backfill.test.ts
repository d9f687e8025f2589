import { describe, it, expect, beforeEach } from 'vitest';
import { EmbeddingBackfill } from '../backfill.js';
import { MockTextEmbedder } from '../../embeddings/mock.js';
import type { IngestConfig } from '../../config/schema.js';
import { FakeSegmentIndex } from '../../search/__tests__/fake-index.js';
import { createProgressStub } from './progress-stub.js';

const config: IngestConfig = {
  minDuration: 15,
  maxDuration: 120,
  embedBatchSize: 8,
  bulkBatchSize: 2,
};

describe('EmbeddingBackfill', () => {
  let index: FakeSegmentIndex;

  beforeEach(() => {
    index = new FakeSegmentIndex()
      .add('seg:0', { text: 'الصلاة', start: 0, end: 5, video_link: 'v1', segment_index: 0, doc_id: 'seg:0' })
      .add('seg:1', { text: 'الزكاة', vector: [1, 0, 0, 0], doc_id: 'seg:1' })
      .add('seg:2', { text: '   ' });
  });

  it('добавляет векторы только документам без них', async () => {
    const progress = createProgressStub();
    const backfill = new EmbeddingBackfill(index, new MockTextEmbedder(4), config, progress);

    const result = await backfill.run();

    expect(result).toMatchObject({ scanned: 3, updated: 1, skipped: 2, failed: 0 });
    expect(index.documents.get('seg:0')).toMatchObject({
      text: 'الصلاة',
      processed_text: 'الصلاه',
      start: 0,
      end: 5,
      video_link: 'v1',
      segment_index: 0,
      doc_id: 'seg:0',
    });
    expect(index.documents.get('seg:0')?.vector).toHaveLength(4);
    expect(index.documents.get('seg:1')?.vector).toEqual([1, 0, 0, 0]);
    expect(progress.onBackfillProgress.mock.calls).toEqual([[2, 1], [3, 1]]);
  });

  it('с force пересчитывает и существующие векторы', async () => {
    const backfill = new EmbeddingBackfill(index, new MockTextEmbedder(4), config, createProgressStub());

    const result = await backfill.run({ force: true });

    expect(result).toMatchObject({ scanned: 3, updated: 2, skipped: 1 });
    expect(index.documents.get('seg:1')?.vector).toHaveLength(4);
    expect(index.documents.get('seg:1')?.vector).not.toEqual([1, 0, 0, 0]);
  });

  it('документы без текста не отправляются в bulk', async () => {
    const backfill = new EmbeddingBackfill(index, new MockTextEmbedder(4), config, createProgressStub());

    await backfill.run({ force: true });

    const written = index.bulkCalls.flat().map((item) => item.id);
    expect(written).toEqual(['seg:0', 'seg:1']);
  });
});
