/**
 * Public exports for the LLM function-calling bridge.
 */

export type {
  ToolCall,
  ToolDefinition,
  ToolMessage,
  ToolExecutionResult,
  ToolBridge,
  ToolBridgeOptions,
} from './types.js';

export { createToolBridge } from './ToolBridge.js';
