/**
 * Bridges the executor to OpenAI-format tool definitions and executes the
 * model's tool calls in-process.
 */

import { ToolError } from '../errors/ToolError.js';
import type { ExecutionResult } from '../executor/ExecutionResult.js';
import type { ToolExecutor } from '../executor/ToolExecutor.js';
import type { ToolBridge, ToolBridgeOptions, ToolCall, ToolDefinition, ToolExecutionResult, ToolMessage } from './types.js';

function toExecutionResult(result: ExecutionResult): ToolExecutionResult {
  return {
    success: result.success,
    content: JSON.stringify(result.success ? result.result : { error: result.error }),
    durationMs: result.durationMs,
  };
}

function failure(message: string, start: number): ToolExecutionResult {
  return {
    success: false,
    content: JSON.stringify({ error: message }),
    durationMs: performance.now() - start,
  };
}

/**
 * Create a ToolBridge over an executor, optionally restricted to an allowlist.
 */
export function createToolBridge(executor: ToolExecutor, options: ToolBridgeOptions = {}): ToolBridge {
  const { allowedTools } = options;
  const isAllowed = (name: string): boolean => allowedTools === undefined || allowedTools.includes(name);

  const executeTool = async (name: string, args: unknown): Promise<ToolExecutionResult> => {
    const start = performance.now();

    // Check allowlist
    if (!isAllowed(name)) {
      return failure(`Tool "${name}" is not allowed`, start);
    }
    return toExecutionResult(await executor.invoke(name, args));
  };

  return {
    getToolDefinitions(): ToolDefinition[] {
      return executor.registry
        .listTools()
        .filter((tool) => isAllowed(tool.name))
        .map((tool) => ({
          type: 'function' as const,
          function: {
            name: tool.name,
            description: tool.description,
            parameters: tool.inputSchema,
          },
        }));
    },

    executeTool,

    async executeToolCalls(toolCalls: readonly ToolCall[]): Promise<ToolMessage[]> {
      const runCall = async (call: ToolCall): Promise<ToolExecutionResult> => {
        let args: unknown;
        try {
          args = call.function.arguments.trim() === '' ? {} : JSON.parse(call.function.arguments);
        } catch (err) {
          const error = ToolError.invalidParameters(
            call.function.name,
            `arguments are not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
          );
          return failure(error.message, performance.now());
        }
        return executeTool(call.function.name, args);
      };

      return Promise.all(
        toolCalls.map(async (call) => ({
          role: 'tool' as const,
          tool_call_id: call.id,
          content: (await runCall(call)).content,
        })),
      );
    },
  };
}
