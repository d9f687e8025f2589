// Разбор JSON-файлов транскриптов.
import { basename } from 'node:path';
import { z } from 'zod';
import type { TranscriptSpan } from './merge.js';

const SpanSchema = z.object({
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  text: z.string(),
});

// Склеенный транскрипт: { video_link, segment: [...] }.
const MergedTranscriptSchema = z.object({
  video_link: z.string().min(1),
  segment: z.array(SpanSchema),
});

// Вывод распознавателя: { segments: [...] }, видео определяется по имени файла.
const RecognizerOutputSchema = z.object({
  video_link: z.string().min(1).optional(),
  segments: z.array(SpanSchema),
});

// Плоский массив документов: [{ video_link, start, end, text, segment_index? }].
const FlatTranscriptSchema = z.array(SpanSchema.extend({
  video_link: z.string().min(1),
  segment_index: z.number().int().nonnegative().optional(),
})).min(1);

export interface ParsedTranscript {
  videoReference: string;
  spans: TranscriptSpan[];
}

// Идентификатор видео из имени файла: <id>_transcript.json или <id>.json.
export function videoIdFromFileName(fileName: string): string {
  return basename(fileName)
    .replace(/\.json$/i, '')
    .replace(/_transcript$/i, '');
}

function withoutBlank(spans: TranscriptSpan[]): TranscriptSpan[] {
  return spans.filter((span) => span.text.trim().length > 0);
}

/**
 * Приводит содержимое файла транскрипта к общему виду.
 * Пустые отрезки отбрасываются. Неизвестный формат даёт ошибку.
 */
export function parseTranscript(raw: unknown, fileName: string): ParsedTranscript {
  const merged = MergedTranscriptSchema.safeParse(raw);
  if (merged.success) {
    return { videoReference: merged.data.video_link, spans: withoutBlank(merged.data.segment) };
  }

  const recognized = RecognizerOutputSchema.safeParse(raw);
  if (recognized.success) {
    const videoReference = recognized.data.video_link
      ?? `https://www.youtube.com/watch?v=${videoIdFromFileName(fileName)}`;
    return { videoReference, spans: withoutBlank(recognized.data.segments) };
  }

  const flat = FlatTranscriptSchema.safeParse(raw);
  if (flat.success) {
    const ordered = [...flat.data].sort((a, b) => (a.segment_index ?? 0) - (b.segment_index ?? 0));
    const [first] = ordered;
    return {
      videoReference: first?.video_link ?? '',
      spans: withoutBlank(ordered.map(({ start, end, text }) => ({ start, end, text }))),
    };
  }

  throw new Error(`Unrecognized transcript format in ${basename(fileName)}`);
}
