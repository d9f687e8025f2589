// Общий HTTP-вызов embeddings API с повторами.
import { z } from 'zod';

// Ответ embeddings API (формат общий у Jina и OpenAI).
const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    index: z.number().int(),
    embedding: z.array(z.number()),
  })),
});

export interface EmbeddingRequest {
  // Имя провайдера для сообщений об ошибках и логов.
  provider: string;
  url: string;
  apiKey: string;
  body: Record<string, unknown>;
  maxRetries: number;
  // Базовая задержка при 5xx: растёт экспоненциально.
  baseDelayMs: number;
  // Задержка при 429: умножается на номер попытки. Без неё 429 ждёт как 5xx.
  rateLimitDelayMs?: number;
  signal?: AbortSignal;
}

// Задержка, прерываемая через AbortSignal.
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * POST в embeddings API. Повторяет запрос при 429 и 5xx,
 * остальные не-ok статусы сразу дают ошибку.
 * Возвращает векторы в порядке входных текстов.
 */
export async function requestEmbeddings(request: EmbeddingRequest): Promise<number[][]> {
  const { provider, maxRetries, signal } = request;
  const body = JSON.stringify(request.body);

  let lastStatus: number | undefined;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const delayMs = lastStatus === 429 && request.rateLimitDelayMs !== undefined
        ? request.rateLimitDelayMs * attempt
        : request.baseDelayMs * Math.pow(2, attempt - 1);
      process.stderr.write(
        `  [${provider.toLowerCase()}] retry ${attempt}/${maxRetries}, wait ${Math.round(delayMs / 1000)}s\n`,
      );
      await delay(delayMs, signal);
    }

    const response = await fetch(request.url, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${request.apiKey}`,
        'Content-Type': 'application/json',
      },
      body,
      signal,
    });

    // Retry на 429 (rate limit) и 5xx (серверные ошибки).
    if (response.status === 429 || response.status >= 500) {
      lastStatus = response.status;
      lastError = new Error(`${provider} API error: ${response.status} ${response.statusText}`);
      if (attempt < maxRetries) {
        continue;
      }
      throw lastError;
    }

    if (!response.ok) {
      throw new Error(`${provider} API error: ${response.status} ${response.statusText}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`${provider} API returned an unexpected response: ${parsed.error.message}`);
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  throw lastError ?? new Error(`${provider} API: retries exhausted`);
}

// Разбивает входы на пачки и вызывает embedBatch пачками последовательно.
export async function embedInBatches(
  inputs: string[],
  batchSize: number,
  embedChunk: (chunk: string[]) => Promise<number[][]>,
): Promise<number[][]> {
  const results: number[][] = [];
  for (let i = 0; i < inputs.length; i += batchSize) {
    results.push(...await embedChunk(inputs.slice(i, i + batchSize)));
  }
  return results;
}

// Первый вектор ответа; пустой ответ считается ошибкой.
export function firstVector(provider: string, vectors: number[][]): number[] {
  const [vector] = vectors;
  if (!vector) {
    throw new Error(`${provider} API returned no embeddings`);
  }
  return vector;
}
