// Публичный API библиотеки.
export * from './config/index.js';
export * from './text/index.js';
export * from './synonyms/index.js';
export * from './storage/index.js';
export * from './embeddings/index.js';
export * from './search/index.js';
export * from './results/index.js';
export * from './ingest/index.js';
export { createMcpServer, startMcpServer } from './mcp/server.js';
