/**
 * MCP Server - stdio transport
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { tools, getTool, zodToJsonSchema } from './tools/index.js';
import { createChildLogger } from '../utils/logger.js';
import { sanitizeError } from '../utils/errors.js';
import { getModelGateway } from '../core/llm/index.js';

const log = createChildLogger('mcp-server');

export const SERVER_NAME = 'cok-mcp-server';
export const SERVER_VERSION = '1.0.0';

function textResponse(payload: unknown, isError: boolean): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError,
  };
}

/**
 * Run one tool call; never throws
 */
export async function callTool(name: string, args: unknown): Promise<CallToolResult> {
  const tool = getTool(name);
  if (!tool) {
    return textResponse({ success: false, error: `Unknown tool: ${name}` }, true);
  }

  try {
    const result = await tool.handler(args);
    return textResponse(result, !result.success);
  } catch (error) {
    // Full error stays in the server log; the client gets the sanitized message
    log.error({ tool: name, err: error }, 'Tool execution error');
    return textResponse({ success: false, error: `Tool execution failed: ${sanitizeError(error)}` }, true);
  }
}

/**
 * Create and configure the MCP server
 */
export function createServer(): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: tools.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: zodToJsonSchema(tool.inputSchema),
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    return callTool(name, args);
  });

  return server;
}

/**
 * Main entry point
 */
export async function main(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async (): Promise<void> => {
    const stats = getModelGateway().cacheStats();
    log.info({ cache: stats }, 'Shutting down');
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      log.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      log.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });

  log.info(`${SERVER_NAME} v${SERVER_VERSION} started`);
}
