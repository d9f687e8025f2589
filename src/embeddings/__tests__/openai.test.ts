import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAITextEmbedder } from '../openai.js';

function fakeVector(dimensions: number, seed = 0): number[] {
  return Array.from({ length: dimensions }, (_, i) => (i + seed) * 0.001);
}

function okResponse(vectors: number[][]): object {
  return {
    ok: true,
    status: 200,
    json: async () => ({ data: vectors.map((embedding, index) => ({ index, embedding })) }),
  };
}

interface OpenAIRequestBody {
  model: string;
  input: string[];
  dimensions: number;
  task?: string;
}

function requestBody(call: unknown[]): OpenAIRequestBody {
  const options = call[1] as RequestInit;
  return JSON.parse(options.body as string) as OpenAIRequestBody;
}

const DEFAULT_CONFIG = {
  apiKey: 'test-api-key',
  model: 'text-embedding-3-small',
  dimensions: 768,
};

describe('OpenAITextEmbedder', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('embed() отправляет корректное тело запроса без поля task', async () => {
    fetchMock.mockResolvedValueOnce(okResponse([fakeVector(768)]));

    const embedder = new OpenAITextEmbedder(DEFAULT_CONFIG);
    const result = await embedder.embed('test text');

    expect(result).toHaveLength(768);

    const [url] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe('https://api.openai.com/v1/embeddings');
    expect(requestBody(fetchMock.mock.calls[0]!)).toEqual({
      model: 'text-embedding-3-small',
      input: ['test text'],
      dimensions: 768,
    });
  });

  it('embedQuery() отправляет тот же запрос, что и embed()', async () => {
    fetchMock.mockResolvedValue(okResponse([fakeVector(768)]));

    const embedder = new OpenAITextEmbedder(DEFAULT_CONFIG);
    await embedder.embed('query');
    await embedder.embedQuery('query');

    expect(requestBody(fetchMock.mock.calls[1]!)).toEqual(requestBody(fetchMock.mock.calls[0]!));
  });

  it('embedBatch() разбивает входные данные на батчи по 100', async () => {
    const inputs = Array.from({ length: 250 }, (_, i) => `text ${i}`);

    fetchMock.mockImplementation(async (_url: string, options: RequestInit) => {
      const body = JSON.parse(options.body as string) as OpenAIRequestBody;
      return okResponse(body.input.map((_, i) => fakeVector(4, i)));
    });

    const embedder = new OpenAITextEmbedder({ ...DEFAULT_CONFIG, dimensions: 4 });
    const results = await embedder.embedBatch(inputs);

    const batchSizes = fetchMock.mock.calls.map((call: unknown[]) => requestBody(call).input.length);
    expect(batchSizes).toEqual([100, 100, 50]);
    expect(results).toHaveLength(250);
  });

  it('выбрасывает ошибку при не-ok статусе ответа API', async () => {
    fetchMock.mockResolvedValueOnce({ ok: false, status: 401, statusText: 'Unauthorized' });

    const embedder = new OpenAITextEmbedder(DEFAULT_CONFIG);

    await expect(embedder.embed('test')).rejects.toThrow('OpenAI API error: 401 Unauthorized');
  });

  describe('retry логика', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('при 429 ждёт с экспоненциальной задержкой', async () => {
      const vector = fakeVector(768);
      fetchMock
        .mockResolvedValueOnce({ ok: false, status: 429, statusText: 'Too Many Requests' })
        .mockResolvedValueOnce({ ok: false, status: 429, statusText: 'Too Many Requests' })
        .mockResolvedValueOnce(okResponse([vector]));

      const embedder = new OpenAITextEmbedder(DEFAULT_CONFIG);
      const promise = embedder.embed('test');

      // 1с, затем 2с.
      await vi.advanceTimersByTimeAsync(3000);

      expect(await promise).toEqual(vector);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('выбрасывает ошибку после исчерпания всех retry-попыток', async () => {
      fetchMock.mockResolvedValue({ ok: false, status: 500, statusText: 'Internal Server Error' });

      const embedder = new OpenAITextEmbedder(DEFAULT_CONFIG);
      const assertion = expect(embedder.embed('test')).rejects.toThrow('OpenAI API error: 500 Internal Server Error');

      // 1с, 2с, 4с.
      await vi.advanceTimersByTimeAsync(7000);
      await assertion;

      expect(fetchMock).toHaveBeenCalledTimes(4);
    });
  });
});
