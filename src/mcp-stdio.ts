#!/usr/bin/env node
/**
 * MCP stdio transport entry point.
 *
 * Serves the built-in tools over stdio.
 * Usage: tool-engine-mcp [configPath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerBuiltinTools } from './builtin/index.js';
import { loadConfig, toExecutionConfig } from './config/loader.js';
import { ToolExecutor } from './executor/ToolExecutor.js';
import { stderrLogger } from './logging/logger.js';
import { createMcpServer } from './mcp/index.js';
import { ToolRegistry } from './registry/ToolRegistry.js';

async function main(): Promise<void> {
  const configPath = process.argv[2];
  // stdout carries MCP JSON-RPC; every log line goes to stderr
  const config = await loadConfig(configPath !== undefined ? { configPath } : {});
  const logger = stderrLogger({ level: config.logging.level, name: config.logging.name });

  const registry = new ToolRegistry({ logger });
  registerBuiltinTools(registry);
  const executor = new ToolExecutor(registry, toExecutionConfig(config), { logger });

  const server = createMcpServer(executor, { logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info({ tools: registry.toolNames() }, 'MCP server connected via stdio');
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  process.exit(1);
});
