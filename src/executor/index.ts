export { ToolExecutor, ExecutorBuilder } from './ToolExecutor.js';
export type { ExecutionRequest, ToolExecutorOptions } from './ToolExecutor.js';
export {
  DEFAULT_EXECUTION_CONFIG,
  DEFAULT_BACKOFF_DELAY_MS,
  DEFAULT_EXPONENTIAL_BACKOFF,
  computeBackoffDelay,
  exponentialBackoff,
  fixedBackoff,
  freezeExecutionConfig,
  resolveToolPolicy,
} from './ExecutionConfig.js';
export type { BackoffPolicy, ExecutionConfig, ToolOverride } from './ExecutionConfig.js';
export { isExecutionSuccess } from './ExecutionResult.js';
export type { ExecutionResult, ExecutionSuccess, ExecutionFailure } from './ExecutionResult.js';
export { runWithTimeout, sleep } from './timeout.js';
export type { TimeoutOptions, LateOutcome } from './timeout.js';
