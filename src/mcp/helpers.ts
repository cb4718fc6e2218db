/**
 * MCP response helpers.
 */

import type { CallToolResult, Tool as McpTool } from '@modelcontextprotocol/sdk/types.js';
import type { ExecutionResult } from '../executor/ExecutionResult.js';
import type { ToolListing } from '../tools/ToolMetadata.js';
import { isRecord } from '../types/json.js';

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result.
 */
export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

export function executionToCallResult(result: ExecutionResult): CallToolResult {
  return result.success ? jsonResult(result.result) : errorResult(result.error);
}

/**
 * MCP tool descriptor for a registry listing. MCP requires an object-typed
 * input schema, so `type` is forced to "object".
 */
export function toMcpTool(listing: ToolListing): McpTool {
  const { inputSchema } = listing;
  const properties: Record<string, object> = {};
  const declared = inputSchema['properties'];
  if (isRecord(declared)) {
    for (const [key, schema] of Object.entries(declared)) {
      if (isRecord(schema)) properties[key] = schema;
    }
  }
  const required = Array.isArray(inputSchema['required'])
    ? inputSchema['required'].filter((name): name is string => typeof name === 'string')
    : undefined;

  return {
    name: listing.name,
    description: listing.description,
    inputSchema: {
      ...inputSchema,
      type: 'object',
      properties,
      ...(required !== undefined ? { required } : {}),
    },
  };
}
