/**
 * MCP server over stdio
 * Exposes retrieval to MCP clients as the `query_codebase` and `get_index_status` tools.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { ProjectContext } from '../core/context.js';
import { formatResults } from '../core/search.js';
import { getIndexStatus } from '../core/status.js';
import { errorMessage } from '../errors/index.js';

export const TOOLS: Tool[] = [
  {
    name: 'query_codebase',
    description:
      'Find the code and documentation fragments most relevant to a natural language query. ' +
      'Returns a context document listing each fragment with its file, type, name and score.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Natural language query' },
        top_k: { type: 'number', description: 'Maximum number of fragments' },
        threshold: { type: 'number', description: 'Minimum score between 0 and 1' },
        project: { type: 'string', description: 'Registered project name (default: current)' }
      },
      required: ['query']
    }
  },
  {
    name: 'get_index_status',
    description: 'Report whether the project has an index, its build, and the last indexing run.',
    inputSchema: {
      type: 'object',
      properties: {
        project: { type: 'string', description: 'Registered project name (default: current)' }
      }
    }
  }
];

const QueryArgsSchema = z.object({
  query: z.string().min(1),
  top_k: z.number().int().positive().optional(),
  threshold: z.number().min(0).max(1).optional(),
  project: z.string().min(1).optional()
});

const StatusArgsSchema = z.object({
  project: z.string().min(1).optional()
});

export interface McpServerOptions {
  openContext: (project?: string) => Promise<ProjectContext>;
  /** Project used when a tool call names none */
  defaultProject?: string;
  version: string;
}

function textResult(text: string, isError = false) {
  return { content: [{ type: 'text' as const, text }], ...(isError ? { isError: true } : {}) };
}

export function createMcpServer(options: McpServerOptions): Server {
  const server = new Server(
    { name: 'code-context-retriever', version: options.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case 'query_codebase': {
          const parsed = QueryArgsSchema.safeParse(args ?? {});
          if (!parsed.success) {
            return textResult(`Invalid arguments: ${parsed.error.message}`, true);
          }
          const { query, top_k, threshold, project } = parsed.data;
          const ctx = await options.openContext(project ?? options.defaultProject);
          const results = await ctx.queryEngine.query({ text: query, topK: top_k, threshold });
          return textResult(formatResults(query, results));
        }

        case 'get_index_status': {
          const parsed = StatusArgsSchema.safeParse(args ?? {});
          if (!parsed.success) {
            return textResult(`Invalid arguments: ${parsed.error.message}`, true);
          }
          const ctx = await options.openContext(parsed.data.project ?? options.defaultProject);
          return textResult(JSON.stringify(await getIndexStatus(ctx), null, 2));
        }

        default:
          return textResult(`Unknown tool: ${name}`, true);
      }
    } catch (error) {
      console.error(`Tool ${name} failed:`, errorMessage(error));
      return textResult(`Error: ${errorMessage(error)}`, true);
    }
  });

  return server;
}

export async function startMcpServer(options: McpServerOptions): Promise<Server> {
  const server = createMcpServer(options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('MCP server ready on stdio');
  return server;
}
