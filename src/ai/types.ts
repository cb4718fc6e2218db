/**
 * Types for the LLM function-calling bridge.
 *
 * These follow the OpenAI-compatible chat completion shapes, which is what
 * most inference servers accept for tool use.
 */

// ============================================================================
// OpenAI-compatible message types
// ============================================================================

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>; // JSON Schema
  };
}

/** Reply to one tool call, to append to the conversation. */
export interface ToolMessage {
  role: 'tool';
  tool_call_id: string;
  /** JSON string of the tool result, or of `{ error }` */
  content: string;
}

// ============================================================================
// Tool execution
// ============================================================================

export interface ToolExecutionResult {
  success: boolean;
  /** JSON string of tool result. */
  content: string;
  durationMs: number;
}

export interface ToolBridgeOptions {
  /** Only these tools are advertised and callable (default: every enabled tool) */
  allowedTools?: readonly string[];
}

export interface ToolBridge {
  /** OpenAI-compatible definitions of the tools the model may call. */
  getToolDefinitions(): ToolDefinition[];
  executeTool(name: string, args: unknown): Promise<ToolExecutionResult>;
  /** Run an assistant turn's tool calls concurrently; replies are in call order. */
  executeToolCalls(toolCalls: readonly ToolCall[]): Promise<ToolMessage[]>;
}
