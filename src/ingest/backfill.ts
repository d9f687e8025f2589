// Пересчёт эмбеддингов для документов, уже лежащих в индексе.
import type { IngestConfig } from '../config/schema.js';
import type { TextEmbedder } from '../embeddings/types.js';
import { segmentFromSource, segmentToDocument, sourceHasVector } from '../storage/schema.js';
import type { BulkItem, IndexHit, SegmentIndex } from '../storage/types.js';
import { normalizeText } from '../text/normalizer.js';
import { embedTexts } from './ingester.js';
import type { BackfillResult, ProgressReporter } from './progress.js';

export interface BackfillOptions {
  // Пересчитать и документы, у которых вектор уже есть.
  force?: boolean;
}

export class EmbeddingBackfill {
  constructor(
    private index: SegmentIndex,
    private embedder: TextEmbedder,
    private config: IngestConfig,
    private progress: ProgressReporter,
  ) {}

  // Документы страницы, которым нужен вектор. Документы без текста пропускаются.
  private selectPending(page: IndexHit[], force: boolean): { pending: BulkItem[]; skipped: number } {
    const pending: BulkItem[] = [];
    let skipped = 0;

    for (const hit of page) {
      const segment = segmentFromSource(hit.id, hit.source);
      if (segment.text.trim() === '' || (!force && sourceHasVector(hit.source))) {
        skipped++;
        continue;
      }
      const processedText = normalizeText(segment.text);
      // Документ перезаписывается под прежним _id.
      pending.push({ id: hit.id, document: segmentToDocument({ ...segment, processedText }) });
    }

    return { pending, skipped };
  }

  async run(options: BackfillOptions = {}): Promise<BackfillResult> {
    const startTime = Date.now();
    const force = options.force ?? false;

    let scanned = 0;
    let updated = 0;
    let skipped = 0;
    let failed = 0;

    for await (const page of this.index.scan(this.config.bulkBatchSize)) {
      scanned += page.length;
      const selection = this.selectPending(page, force);
      skipped += selection.skipped;

      if (selection.pending.length > 0) {
        const texts = selection.pending.map((item) => item.document.processed_text ?? '');
        const vectors = await embedTexts(this.embedder, texts, this.config.embedBatchSize);
        selection.pending.forEach((item, i) => {
          item.document.vector = vectors[i];
        });

        const result = await this.index.bulk(selection.pending);
        updated += result.indexed;
        failed += result.failed;
        if (result.errors.length > 0) {
          this.progress.onBulkErrors(result.errors);
        }
      }

      this.progress.onBackfillProgress(scanned, updated);
    }

    if (updated > 0) {
      await this.index.refresh();
    }

    const result: BackfillResult = { scanned, updated, skipped, failed, duration: Date.now() - startTime };
    this.progress.onBackfillComplete(result);
    return result;
  }
}
