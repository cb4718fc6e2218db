/**
 * tool-engine: typed tool registration, validation and dispatch for AI
 * orchestration loops.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Errors and retry classification
export * from './errors/index.js';

// Logging
export { createLogger, silentLogger, stderrLogger, LOG_LEVELS } from './logging/logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logging/logger.js';

// Validation
export { AjvValidator, createValidator, defaultValidator } from './validation/AjvValidator.js';
export { formatValidationErrors } from './validation/types.js';
export type { ValidationError, ValidationResult, ValidatorOptions, CompiledValidator } from './validation/types.js';

// Tools
export * from './tools/index.js';

// Registry
export * from './registry/index.js';

// Executor
export * from './executor/index.js';

// Monitoring
export * from './monitoring/index.js';

// Built-in tools
export * from './builtin/index.js';

// Configuration
export {
  loadConfig,
  parseConfig,
  substituteEnvVars,
  toExecutionConfig,
  ConfigValidationError,
  DEFAULT_CONFIG_PATH,
} from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/types.js';
export type { AppConfig, BackoffConfig, ExecutorSettings, LoggingConfig, ToolSettings } from './config/types.js';

// LLM function-calling bridge
export * from './ai/index.js';

// MCP server
export * from './mcp/index.js';
