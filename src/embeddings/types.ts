// Интерфейс генератора эмбеддингов текста.
// Тексты приходят уже нормализованными (normalizeText).
export interface TextEmbedder {
  // Эмбеддинг одного фрагмента транскрипта (passage).
  embed(input: string): Promise<number[]>;

  // Батч-генерация эмбеддингов фрагментов, порядок сохраняется.
  embedBatch(inputs: string[]): Promise<number[][]>;

  // Эмбеддинг поискового запроса. signal прерывает запрос и ожидание retry.
  embedQuery(input: string, signal?: AbortSignal): Promise<number[]>;

  // Размерность вектора.
  readonly dimensions: number;
}
