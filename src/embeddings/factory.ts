import type { EmbeddingsConfig } from '../config/schema.js';
import type { TextEmbedder } from './types.js';
import { JinaTextEmbedder } from './jina.js';
import { MockTextEmbedder } from './mock.js';
import { OpenAITextEmbedder } from './openai.js';

// Создание TextEmbedder по конфигурации. provider 'none' означает работу без эмбеддингов.
export function createTextEmbedder(config: EmbeddingsConfig): TextEmbedder | null {
  switch (config.provider) {
  case 'jina': {
    if (!config.jina) {
      throw new Error('Jina embeddings config is required when provider is "jina"');
    }
    return new JinaTextEmbedder({
      apiKey: config.jina.apiKey,
      model: config.jina.model,
      dimensions: config.dimensions,
    });
  }
  case 'openai': {
    if (!config.openai) {
      throw new Error('OpenAI embeddings config is required when provider is "openai"');
    }
    return new OpenAITextEmbedder({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      dimensions: config.dimensions,
    });
  }
  case 'mock':
    return new MockTextEmbedder(config.dimensions);
  case 'none':
    return null;
  }
}
