import type { TextEmbedder } from './types.js';
import { embedInBatches, firstVector, requestEmbeddings } from './http.js';

// Конфигурация Jina Embeddings.
export interface JinaConfig {
  apiKey: string;
  model: string;
  dimensions: number;
}

// Тип задачи для Jina API.
type JinaTask = 'retrieval.passage' | 'retrieval.query';

// Максимальное количество элементов в одном батче.
const BATCH_SIZE = 64;

// Максимальное количество повторных попыток.
const MAX_RETRIES = 5;

// Базовая задержка между попытками при 5xx (мс).
const BASE_DELAY_MS = 1000;

// Задержка при 429 Too Many Requests (мс): 60с, 120с, 180с...
const RATE_LIMIT_DELAY_MS = 60_000;

// URL Jina Embeddings API.
const JINA_API_URL = 'https://api.jina.ai/v1/embeddings';

// Реализация TextEmbedder для Jina Embeddings v3 (мультиязычная, с арабским).
export class JinaTextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly model: string;

  constructor(config: JinaConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.dimensions = config.dimensions;
  }

  async embed(input: string): Promise<number[]> {
    return firstVector('Jina', await this.callApi([input], 'retrieval.passage'));
  }

  async embedBatch(inputs: string[]): Promise<number[][]> {
    return embedInBatches(inputs, BATCH_SIZE, (chunk) => this.callApi(chunk, 'retrieval.passage'));
  }

  async embedQuery(input: string, signal?: AbortSignal): Promise<number[]> {
    return firstVector('Jina', await this.callApi([input], 'retrieval.query', signal));
  }

  private callApi(input: string[], task: JinaTask, signal?: AbortSignal): Promise<number[][]> {
    return requestEmbeddings({
      provider: 'Jina',
      url: JINA_API_URL,
      apiKey: this.apiKey,
      body: {
        model: this.model,
        input,
        task,
        dimensions: this.dimensions,
        // Автоматически обрезает тексты, превышающие лимит модели.
        truncate: true,
      },
      maxRetries: MAX_RETRIES,
      baseDelayMs: BASE_DELAY_MS,
      rateLimitDelayMs: RATE_LIMIT_DELAY_MS,
      signal,
    });
  }
}
