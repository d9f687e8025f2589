// Barrel-файл модуля эмбеддингов.
export type { TextEmbedder } from './types.js';
export type { JinaConfig } from './jina.js';
export type { OpenAIConfig } from './openai.js';

export { JinaTextEmbedder } from './jina.js';
export { OpenAITextEmbedder } from './openai.js';
export { MockTextEmbedder } from './mock.js';
export { createTextEmbedder } from './factory.js';
