// Загрузка транскриптов: merge → документы → эмбеддинги → bulk.
import type { IngestConfig } from '../config/schema.js';
import type { TextEmbedder } from '../embeddings/types.js';
import { extractVideoId } from '../results/video-link.js';
import type { SegmentDocument } from '../storage/schema.js';
import type { BulkItem, SegmentIndex } from '../storage/types.js';
import { normalizeText } from '../text/normalizer.js';
import { readTranscriptFile, type TranscriptFile } from './files.js';
import { mergeShortSpans } from './merge.js';
import type { IngestResult, ProgressReporter } from './progress.js';
import { videoIdFromFileName, type ParsedTranscript } from './transcript.js';

// Итог загрузки одного транскрипта.
export interface TranscriptIngestResult {
  segments: number;
  indexed: number;
  failed: number;
}

// Округление до сотых секунды, как в файлах транскриптов.
function roundSeconds(value: number): number {
  return Math.round(value * 100) / 100;
}

// Эмбеддинги пачками фиксированного размера, последовательно.
export async function embedTexts(
  embedder: TextEmbedder,
  texts: string[],
  batchSize: number,
  onProgress?: (current: number, total: number) => void,
): Promise<number[][]> {
  const vectors: number[][] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);
    const batchVectors = await embedder.embedBatch(batch);
    if (batchVectors.length !== batch.length) {
      throw new Error(`Embedder returned ${batchVectors.length} vectors for ${batch.length} texts`);
    }
    for (const vector of batchVectors) {
      if (vector.length !== embedder.dimensions) {
        throw new Error(`Embedding has ${vector.length} dimensions, expected ${embedder.dimensions}`);
      }
    }
    vectors.push(...batchVectors);
    onProgress?.(Math.min(i + batchSize, texts.length), texts.length);
  }
  return vectors;
}

export class SegmentIngester {
  constructor(
    private index: SegmentIndex,
    private embedder: TextEmbedder | null,
    private config: IngestConfig,
    private progress: ProgressReporter,
  ) {}

  /**
   * Строит документы индекса из транскрипта. doc_id = <videoId>:<номер сегмента>,
   * поэтому повторная загрузка того же файла перезаписывает документы.
   */
  buildDocuments(transcript: ParsedTranscript, fileName: string): BulkItem[] {
    const videoId = extractVideoId(transcript.videoReference) || videoIdFromFileName(fileName);
    const spans = mergeShortSpans(transcript.spans, {
      minDuration: this.config.minDuration,
      maxDuration: this.config.maxDuration,
    });

    return spans.map((span, segmentIndex) => {
      const id = `${videoId}:${segmentIndex}`;
      const document: SegmentDocument = {
        text: span.text,
        processed_text: normalizeText(span.text),
        start: roundSeconds(span.start),
        end: roundSeconds(span.end),
        video_link: transcript.videoReference,
        segment_index: segmentIndex,
        doc_id: id,
      };
      return { id, document };
    });
  }

  async ingestTranscript(transcript: ParsedTranscript, fileName: string): Promise<TranscriptIngestResult> {
    const items = this.buildDocuments(transcript, fileName);

    if (this.embedder && items.length > 0) {
      const texts = items.map((item) => item.document.processed_text ?? '');
      const vectors = await embedTexts(
        this.embedder,
        texts,
        this.config.embedBatchSize,
        (current, total) => this.progress.onEmbedProgress(current, total),
      );
      items.forEach((item, i) => {
        item.document.vector = vectors[i];
      });
    }

    let indexed = 0;
    let failed = 0;
    for (let i = 0; i < items.length; i += this.config.bulkBatchSize) {
      const result = await this.index.bulk(items.slice(i, i + this.config.bulkBatchSize));
      indexed += result.indexed;
      failed += result.failed;
      if (result.errors.length > 0) {
        this.progress.onBulkErrors(result.errors);
      }
    }

    this.progress.onFileIndexed(fileName, transcript.spans.length, items.length);
    return { segments: items.length, indexed, failed };
  }

  // Загружает файлы по одному. Файл, который не удалось прочитать или разобрать, пропускается.
  async ingestFiles(files: TranscriptFile[]): Promise<IngestResult> {
    const startTime = Date.now();
    this.progress.onScanComplete(files.length);

    let skippedFiles = 0;
    let totalSegments = 0;
    let indexed = 0;
    let failed = 0;

    for (const file of files) {
      let transcript: ParsedTranscript;
      try {
        transcript = await readTranscriptFile(file);
      } catch (error) {
        skippedFiles++;
        this.progress.onFileSkipped(file.relativePath, error instanceof Error ? error.message : String(error));
        continue;
      }

      const result = await this.ingestTranscript(transcript, file.relativePath);
      totalSegments += result.segments;
      indexed += result.indexed;
      failed += result.failed;
    }

    if (indexed > 0) {
      await this.index.refresh();
    }

    const result: IngestResult = {
      totalFiles: files.length,
      skippedFiles,
      totalSegments,
      indexed,
      failed,
      duration: Date.now() - startTime,
    };
    this.progress.onIngestComplete(result);
    return result;
  }
}
