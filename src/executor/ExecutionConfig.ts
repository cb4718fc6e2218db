/**
 * Execution policy: timeout, retries, backoff, logging and monitoring.
 */

import type { RetryMode } from '../errors/RetryPolicy.js';

export type BackoffPolicy =
  | { kind: 'fixed'; delayMs: number }
  | { kind: 'exponential'; initialDelayMs: number; maxDelayMs: number; multiplier: number };

export interface ToolOverride {
  /** `null` disables the timeout for this tool */
  timeoutMs?: number | null;
  maxRetries?: number;
  /** `false` makes the tool unavailable through this executor */
  enabled?: boolean;
}

export interface ExecutionConfig {
  /** Per-attempt bound in milliseconds; `null` means no timeout */
  timeoutMs: number | null;
  /** Additional attempts after the first */
  maxRetries: number;
  backoff: BackoffPolicy;
  retryMode: RetryMode;
  enableLogging: boolean;
  enableMonitoring: boolean;
  toolOverrides: Record<string, ToolOverride>;
}

export const DEFAULT_BACKOFF_DELAY_MS = 100;

/** Longest delay a Node timer honours; larger ones fire after about 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const DEFAULT_EXPONENTIAL_BACKOFF = {
  kind: 'exponential',
  initialDelayMs: 100,
  maxDelayMs: 30_000,
  multiplier: 2,
} as const satisfies BackoffPolicy;

export const DEFAULT_EXECUTION_CONFIG: Readonly<ExecutionConfig> = Object.freeze({
  timeoutMs: 30_000,
  maxRetries: 0,
  backoff: Object.freeze({ kind: 'fixed', delayMs: DEFAULT_BACKOFF_DELAY_MS }),
  retryMode: 'transient-only',
  enableLogging: false,
  enableMonitoring: false,
  toolOverrides: Object.freeze({}),
});

export function fixedBackoff(delayMs: number = DEFAULT_BACKOFF_DELAY_MS): BackoffPolicy {
  return { kind: 'fixed', delayMs };
}

export function exponentialBackoff(
  options: Partial<Omit<Extract<BackoffPolicy, { kind: 'exponential' }>, 'kind'>> = {},
): BackoffPolicy {
  return { ...DEFAULT_EXPONENTIAL_BACKOFF, ...options };
}

/**
 * Delay before retry `retry` (1-based) of the same invocation.
 */
export function computeBackoffDelay(policy: BackoffPolicy, retry: number): number {
  if (policy.kind === 'fixed') {
    return policy.delayMs;
  }
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, Math.max(0, retry - 1));
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Effective per-attempt settings for one tool.
 */
export function resolveToolPolicy(
  config: ExecutionConfig,
  toolName: string,
): { timeoutMs: number | null; maxRetries: number; enabled: boolean } {
  const override = config.toolOverrides[toolName];
  return {
    timeoutMs: override?.timeoutMs !== undefined ? override.timeoutMs : config.timeoutMs,
    maxRetries: override?.maxRetries ?? config.maxRetries,
    enabled: override?.enabled ?? true,
  };
}

function assertNonNegativeInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${field} must be a non-negative integer, got ${value}`);
  }
}

function assertTimerBound(value: number, field: string): void {
  if (value > MAX_TIMER_DELAY_MS) {
    throw new RangeError(`${field} must be <= ${MAX_TIMER_DELAY_MS}, got ${value}`);
  }
}

/**
 * @throws RangeError unless `value` is a usable timer delay above zero
 */
export function assertPositiveDelay(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${field} must be a positive number, got ${value}`);
  }
  assertTimerBound(value, field);
}

/**
 * Check and freeze a complete configuration.
 *
 * @throws RangeError for out-of-range numbers
 */
export function freezeExecutionConfig(config: ExecutionConfig): Readonly<ExecutionConfig> {
  if (config.timeoutMs !== null) assertPositiveDelay(config.timeoutMs, 'timeoutMs');
  assertNonNegativeInteger(config.maxRetries, 'maxRetries');

  const { backoff } = config;
  if (backoff.kind === 'fixed') {
    if (!(backoff.delayMs >= 0)) throw new RangeError(`backoff.delayMs must be >= 0, got ${backoff.delayMs}`);
    assertTimerBound(backoff.delayMs, 'backoff.delayMs');
  } else {
    if (!(backoff.initialDelayMs >= 0)) {
      throw new RangeError(`backoff.initialDelayMs must be >= 0, got ${backoff.initialDelayMs}`);
    }
    assertTimerBound(backoff.initialDelayMs, 'backoff.initialDelayMs');
    assertPositiveDelay(backoff.maxDelayMs, 'backoff.maxDelayMs');
    if (!(backoff.multiplier >= 1)) throw new RangeError(`backoff.multiplier must be >= 1, got ${backoff.multiplier}`);
  }

  const overrides: Record<string, ToolOverride> = {};
  for (const [name, override] of Object.entries(config.toolOverrides)) {
    if (override.timeoutMs !== undefined && override.timeoutMs !== null) {
      assertPositiveDelay(override.timeoutMs, `toolOverrides.${name}.timeoutMs`);
    }
    if (override.maxRetries !== undefined) {
      assertNonNegativeInteger(override.maxRetries, `toolOverrides.${name}.maxRetries`);
    }
    overrides[name] = Object.freeze({ ...override });
  }

  return Object.freeze({
    ...config,
    backoff: Object.freeze({ ...backoff }),
    toolOverrides: Object.freeze(overrides),
  });
}
