// Реэкспорт модулей загрузки транскриптов.
export type { TranscriptSpan, MergeOptions } from './merge.js';
export type { ParsedTranscript } from './transcript.js';
export type { TranscriptFile } from './files.js';
export type { IngestResult, BackfillResult, ProgressReporter } from './progress.js';
export type { TranscriptIngestResult } from './ingester.js';
export type { BackfillOptions } from './backfill.js';

export { mergeShortSpans, DEFAULT_MERGE_OPTIONS } from './merge.js';
export { parseTranscript, videoIdFromFileName } from './transcript.js';
export { scanTranscriptFiles, readTranscriptFile } from './files.js';
export { ConsoleProgress } from './progress.js';
export { SegmentIngester, embedTexts } from './ingester.js';
export { EmbeddingBackfill } from './backfill.js';
