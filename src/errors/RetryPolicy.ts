import type { ToolError } from './ToolError.js';

export type FailureClass = 'transient' | 'terminal' | 'unknown';

export type RetryMode = 'transient-only' | 'all';

export type RetryPolicyResult = {
  failureClass: FailureClass;
  retryRecommended: boolean;
  failureCode: string;
  reason: string;
};

const TEMPORARY_PATTERN = /timeout|timed out|temporar|econnreset|etimedout|eai_again|rate limit/;

export function classifyToolFailure(error: ToolError): RetryPolicyResult {
  const message = error.detail.toLowerCase();

  switch (error.kind) {
    case 'NotFound':
      return { failureClass: 'terminal', retryRecommended: false, failureCode: 'TOOL_NOT_FOUND', reason: 'tool_missing_or_disabled' };
    case 'InvalidParameters':
      return { failureClass: 'terminal', retryRecommended: false, failureCode: 'INVALID_PARAMETERS', reason: 'invalid_parameters' };
    case 'AlreadyExists':
      return { failureClass: 'terminal', retryRecommended: false, failureCode: 'ALREADY_EXISTS', reason: 'registration_conflict' };
    case 'TimeoutError':
      return { failureClass: 'transient', retryRecommended: true, failureCode: 'TIMEOUT', reason: 'attempt_timed_out' };
    case 'ExecutionFailed':
      if (error.transient === true) {
        return { failureClass: 'transient', retryRecommended: true, failureCode: 'DECLARED_TRANSIENT', reason: 'tool_declared_transient' };
      }
      if (error.transient === undefined && TEMPORARY_PATTERN.test(message)) {
        return { failureClass: 'transient', retryRecommended: true, failureCode: 'TIMEOUT_TEMPORARY', reason: 'timeout_or_temporary' };
      }
      return { failureClass: 'terminal', retryRecommended: false, failureCode: 'EXECUTION_FAILED', reason: 'tool_execution_failed' };
    case 'Unknown':
      return { failureClass: 'unknown', retryRecommended: false, failureCode: 'UNCLASSIFIED', reason: 'unclassified' };
  }
}

/**
 * Whether a failed attempt should be followed by another one under the given mode.
 * Registration, lookup and parameter failures are never retried.
 */
export function shouldRetry(error: ToolError, mode: RetryMode): boolean {
  if (mode === 'all') {
    return error.kind === 'TimeoutError' || error.kind === 'ExecutionFailed' || error.kind === 'Unknown';
  }
  return classifyToolFailure(error).retryRecommended;
}
