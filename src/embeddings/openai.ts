import type { TextEmbedder } from './types.js';
import { embedInBatches, firstVector, requestEmbeddings } from './http.js';

// Конфигурация OpenAI Embeddings.
export interface OpenAIConfig {
  apiKey: string;
  model: string;
  dimensions: number;
}

const BATCH_SIZE = 100;
const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;
const OPENAI_API_URL = 'https://api.openai.com/v1/embeddings';

// Реализация TextEmbedder для OpenAI Embeddings.
export class OpenAITextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly model: string;

  constructor(config: OpenAIConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.dimensions = config.dimensions;
  }

  async embed(input: string): Promise<number[]> {
    return firstVector('OpenAI', await this.callApi([input]));
  }

  async embedBatch(inputs: string[]): Promise<number[][]> {
    return embedInBatches(inputs, BATCH_SIZE, (chunk) => this.callApi(chunk));
  }

  // OpenAI не различает запросы и фрагменты.
  async embedQuery(input: string, signal?: AbortSignal): Promise<number[]> {
    return firstVector('OpenAI', await this.callApi([input], signal));
  }

  private callApi(input: string[], signal?: AbortSignal): Promise<number[][]> {
    return requestEmbeddings({
      provider: 'OpenAI',
      url: OPENAI_API_URL,
      apiKey: this.apiKey,
      body: { model: this.model, input, dimensions: this.dimensions },
      maxRetries: MAX_RETRIES,
      baseDelayMs: BASE_DELAY_MS,
      signal,
    });
  }
}
