// Склейка коротких отрезков распознанной речи.

// Отрезок транскрипта (секунды от начала видео).
export interface TranscriptSpan {
  start: number;
  end: number;
  text: string;
}

export interface MergeOptions {
  // Отрезок короче этого склеивается со следующим.
  minDuration: number;
  // Склеенный отрезок не может быть длиннее.
  maxDuration: number;
}

export const DEFAULT_MERGE_OPTIONS: MergeOptions = {
  minDuration: 15,
  maxDuration: 120,
};

/**
 * Присоединяет к текущему отрезку следующий, пока текущий короче minDuration,
 * а общая длительность не превышает maxDuration. Тексты соединяются одним пробелом.
 * Входной массив не изменяется.
 */
export function mergeShortSpans(
  spans: readonly TranscriptSpan[],
  options: MergeOptions = DEFAULT_MERGE_OPTIONS,
): TranscriptSpan[] {
  const [first, ...rest] = spans;
  if (!first) {
    return [];
  }

  const merged: TranscriptSpan[] = [];
  let current: TranscriptSpan = { ...first, text: first.text.trim() };

  for (const next of rest) {
    const currentDuration = current.end - current.start;
    const combinedDuration = next.end - current.start;

    if (currentDuration < options.minDuration && combinedDuration <= options.maxDuration) {
      current = { start: current.start, end: next.end, text: `${current.text} ${next.text.trim()}`.trim() };
    } else {
      merged.push(current);
      current = { ...next, text: next.text.trim() };
    }
  }

  merged.push(current);
  return merged;
}
