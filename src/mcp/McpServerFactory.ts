/**
 * Factory function for creating an MCP server over a tool executor.
 *
 * `tools/list` advertises the registry's enabled tools; `tools/call`
 * dispatches through the executor, so calls get the same timeout and retry
 * policy as in-process invocations.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ToolExecutor } from '../executor/ToolExecutor.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { executionToCallResult, toMcpTool } from './helpers.js';

export interface McpServerOptions {
  /** Server name reported to clients (default: 'tool-engine') */
  name?: string;
  /** Server version reported to clients (default: '0.1.0') */
  version?: string;
  logger?: Logger;
}

/**
 * Create and configure an MCP server bound to the given executor.
 */
export function createMcpServer(executor: ToolExecutor, options: McpServerOptions = {}): Server {
  const logger = (options.logger ?? silentLogger()).child({ component: 'McpServer' });
  const server = new Server(
    { name: options.name ?? 'tool-engine', version: options.version ?? '0.1.0' },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: executor.registry.listTools().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = await executor.execute(name, args ?? {});
    logger.debug({ tool: name, success: result.success, durationMs: result.durationMs }, 'Tool call handled');
    return executionToCallResult(result);
  });

  return server;
}
