/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer } from './McpServerFactory.js';
export type { McpServerOptions } from './McpServerFactory.js';
export { jsonResult, errorResult, executionToCallResult, toMcpTool } from './helpers.js';
