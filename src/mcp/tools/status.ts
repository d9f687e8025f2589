// MCP-инструмент status — состояние индекса и конфигурации.
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from '../../config/schema.js';
import { getIndexStatus } from '../../storage/status.js';
import type { SegmentIndex } from '../../storage/types.js';

// Регистрирует инструмент status на MCP-сервере.
export function registerStatusTool(
  server: McpServer,
  index: SegmentIndex,
  config: AppConfig,
): void {
  server.registerTool(
    'status',
    {
      description: 'Get the current status of the transcript search: Elasticsearch connectivity, ' +
        'index existence, segment count, and configuration overview.',
      inputSchema: {},
    },
    async () => {
      try {
        const indexStatus = await getIndexStatus(index);

        const status = {
          elasticsearch: indexStatus,
          embeddings: {
            provider: config.embeddings.provider,
            dimensions: config.embeddings.dimensions,
          },
          search: {
            defaultMode: config.search.defaultMode,
            defaultSize: config.search.defaultSize,
            maxSize: config.search.maxSize,
            semanticBoost: config.search.semanticBoost,
          },
        };

        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify(status, null, 2),
          }],
          ...(indexStatus.connected ? {} : { isError: true }),
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({
              elasticsearch: { connected: false, error: message },
            }, null, 2),
          }],
          isError: true,
        };
      }
    },
  );
}
