/**
 * Public exports for the error taxonomy.
 */

export {
  ToolError,
  ErrorContext,
  errorContext,
  isToolError,
  toToolError,
} from './ToolError.js';
export type { ToolErrorKind, ToolErrorOptions } from './ToolError.js';

export { classifyToolFailure, shouldRetry } from './RetryPolicy.js';
export type { FailureClass, RetryMode, RetryPolicyResult } from './RetryPolicy.js';
