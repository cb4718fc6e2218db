/**
 * Tool definitions and the adapter that erases their types.
 */

export type { InputCodec, Tool, ToolContext, ToolDescriptor } from './Tool.js';
export { zodInput, jsonSchemaInput, formatZodIssues } from './codecs.js';
export { defineTool } from './defineTool.js';
export type { ZodToolDefinition } from './defineTool.js';
export { FunctionTool, FunctionToolBuilder } from './FunctionTool.js';
export type { FunctionHandler, FunctionSpec, FunctionToolMetadata, FunctionToolOptions } from './FunctionTool.js';
export { createToolMetadata, toListing, DEFAULT_TOOL_VERSION } from './ToolMetadata.js';
export type { ToolMetadata, ToolListing } from './ToolMetadata.js';
export { createToolHandle } from './ToolAdapter.js';
export type { ToolHandle, PreparedCall } from './ToolAdapter.js';
export { toStructuredValue, isJsonValue, isJsonObject, SerializationError } from './serialization.js';
