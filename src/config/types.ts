/**
 * Configuration types for the tool engine.
 *
 * These types define the structure of tool-engine.yaml.
 */

import type { RetryMode } from '../errors/RetryPolicy.js';
import type { LogLevel } from '../logging/logger.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  executor: ExecutorSettings;
  logging: LoggingConfig;
  /** Per-tool settings, keyed by tool name */
  tools: Record<string, ToolSettings>;
}

export type BackoffConfig =
  | { kind: 'fixed'; delayMs: number }
  | { kind: 'exponential'; initialDelayMs: number; maxDelayMs: number; multiplier: number };

/**
 * Executor policy.
 */
export interface ExecutorSettings {
  /** Per-attempt timeout in ms; null disables it (default: 30000) */
  timeoutMs: number | null;
  /** Retries after the first attempt (default: 0) */
  maxRetries: number;
  /** Delay between attempts (default: fixed 100ms) */
  backoff: BackoffConfig;
  /** Which failures are retried (default: 'transient-only') */
  retryMode: RetryMode;
  /** Log invocations (default: false) */
  enableLogging: boolean;
  /** Collect execution metrics (default: false) */
  enableMonitoring: boolean;
}

export interface LoggingConfig {
  /** Minimum level (default: 'info') */
  level: LogLevel;
  /** Logger name (default: 'tool-engine') */
  name: string;
}

export interface ToolSettings {
  /** Make the tool unavailable (default: true) */
  enabled?: boolean;
  /** Per-attempt timeout for this tool; null disables it */
  timeoutMs?: number | null;
  /** Retries for this tool */
  retries?: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  executor: {
    timeoutMs: 30_000,
    maxRetries: 0,
    backoff: { kind: 'fixed', delayMs: 100 },
    retryMode: 'transient-only',
    enableLogging: false,
    enableMonitoring: false,
  },
  logging: {
    level: 'info',
    name: 'tool-engine',
  },
  tools: {},
};

export const DEFAULT_EXPONENTIAL_BACKOFF_CONFIG = {
  initialDelayMs: 100,
  maxDelayMs: 30_000,
  multiplier: 2,
} as const;
