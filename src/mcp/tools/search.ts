// MCP-инструмент search — поиск по транскриптам лекций.
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SearchOrchestrator } from '../../search/orchestrator.js';
import { SEARCH_MODES } from '../../search/modes.js';

// Регистрирует инструмент search на MCP-сервере.
export function registerSearchTool(server: McpServer, orchestrator: SearchOrchestrator): void {
  server.registerTool(
    'search',
    {
      description: 'Search Arabic lecture transcripts. Modes: lexical (plain match), ' +
        'enhanced (synonyms, fuzzy and phrase matching), semantic (enhanced plus vector similarity). ' +
        'Results carry MM:SS timestamps and a link to the moment in the video.',
      inputSchema: {
        query: z.string().describe('Search query'),
        // Любое число: границы применяет clampSize.
        size: z.number().optional().describe('Number of results to return (default: 50, max: 1000)'),
        mode: z.enum(SEARCH_MODES).optional().describe('Search mode (default: enhanced)'),
        group: z.boolean().optional().describe('Group results into question/answer conversations'),
      },
    },
    async (args, extra) => {
      const response = await orchestrator.searchSafe({
        query: args.query,
        size: args.size,
        mode: args.mode,
        group: args.group,
        signal: extra.signal,
      });

      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify(response, null, 2),
        }],
        ...('error' in response ? { isError: true } : {}),
      };
    },
  );
}
