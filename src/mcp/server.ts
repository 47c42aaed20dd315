/**
 * MCP Server for partlens
 *
 * Exposes the operation table over the MCP protocol (stdio transport).
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import { OPERATIONS, OperationError, invokeOperation } from '../api/operations.js';
import { loadConfig, type LoadConfigOptions } from '../config/config.js';
import { getComponentLogger } from '../logging/logger.js';
import { createRuntime, type Runtime } from '../runtime/runtime.js';
import { VERSION } from '../version.js';

function errorCodeOf(error: unknown): string {
  if (error instanceof OperationError) return error.code;
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
  return 'INTERNAL_ERROR';
}

/**
 * Run one tool call against the runtime, mapping failures to `isError` results
 */
export async function handleToolCall(
  runtime: Runtime,
  name: string,
  args: unknown
): Promise<CallToolResult> {
  try {
    const result = await invokeOperation(name, args, runtime);
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    return {
      content: [
        {
          type: 'text' as const,
          text: JSON.stringify({
            error: {
              code: errorCodeOf(error),
              message: error instanceof Error ? error.message : String(error),
            },
          }),
        },
      ],
      isError: true,
    };
  }
}

/**
 * Create and configure the MCP server around an existing runtime
 */
export function createMCPServer(runtime: Runtime): Server {
  const server = new Server(
    {
      name: 'partlens',
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: OPERATIONS.map((operation) => ({
      name: operation.name,
      description: operation.description,
      inputSchema: operation.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(runtime, name, args);
  });

  return server;
}

/**
 * Start the MCP server with stdio transport
 */
export async function startMCPServer(options: LoadConfigOptions = {}): Promise<void> {
  const logger = getComponentLogger('mcp');
  const runtime = await createRuntime(loadConfig(options), { background: true });
  const server = createMCPServer(runtime);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info({ operations: OPERATIONS.length }, 'MCP server listening on stdio');

  const shutdown = (): void => {
    void server
      .close()
      .then(() => runtime.close())
      .then(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
