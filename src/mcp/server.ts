// MCP stdio-сервер поиска по транскриптам: search, status.
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppConfig } from '../config/schema.js';
import { createSearchOrchestrator } from '../search/factory.js';
import type { SegmentIndex } from '../storage/types.js';
import { registerSearchTool } from './tools/search.js';
import { registerStatusTool } from './tools/status.js';

// Создаёт MCP-сервер и регистрирует инструменты.
export async function createMcpServer(config: AppConfig, index: SegmentIndex): Promise<McpServer> {
  const server = new McpServer({
    name: 'transcript-search',
    version: '0.1.0',
  });

  const orchestrator = await createSearchOrchestrator(config, index);

  registerSearchTool(server, orchestrator);
  registerStatusTool(server, index, config);

  return server;
}

// Запускает MCP-сервер на stdio.
export async function startMcpServer(config: AppConfig, index: SegmentIndex): Promise<void> {
  const server = await createMcpServer(config, index);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('transcript-search MCP server started');
}
