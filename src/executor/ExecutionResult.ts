import type { ToolErrorKind } from '../errors/ToolError.js';
import type { JsonValue } from '../types/json.js';

interface ExecutionResultBase {
  toolName: string;
  /** Wall-clock from invocation start to the terminal outcome, retries and backoff included */
  durationMs: number;
  /** `execute` attempts made; 0 when lookup or validation failed */
  attempts: number;
  retries: number;
  /** ISO-8601 */
  startedAt: string;
  metadata: Record<string, JsonValue>;
}

export interface ExecutionSuccess extends ExecutionResultBase {
  success: true;
  result: JsonValue;
}

export interface ExecutionFailure extends ExecutionResultBase {
  success: false;
  /** The terminal ToolError's message */
  error: string;
  errorKind: ToolErrorKind;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

export function isExecutionSuccess(result: ExecutionResult): result is ExecutionSuccess {
  return result.success;
}
