/**
 * Configuration loader for the tool engine.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 *
 * Values produced by substitution are strings; numeric and boolean fields
 * accept their string spellings ("5000", "true").
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { RetryMode } from '../errors/RetryPolicy.js';
import { MAX_TIMER_DELAY_MS, type ExecutionConfig, type ToolOverride } from '../executor/ExecutionConfig.js';
import { LOG_LEVELS, stderrLogger, type Logger, type LogLevel } from '../logging/logger.js';
import { isRecord } from '../types/json.js';
import type { AppConfig, BackoffConfig, ExecutorSettings, LoggingConfig, ToolSettings } from './types.js';
import { DEFAULT_CONFIG, DEFAULT_EXPONENTIAL_BACKOFF_CONFIG } from './types.js';

export const DEFAULT_CONFIG_PATH = './tool-engine.yaml';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './tool-engine.yaml') */
  configPath?: string;
  /** Variables for ${VAR} substitution (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Receives warnings (default: a stderr logger) */
  logger?: Logger;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown,
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in every string of a parsed document.
 */
export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv, logger?: Logger): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      logger?.warn({ variable: varName }, 'Environment variable is not set and has no default');
      return '';
    });
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => substituteEnvVars(item, env, logger));
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnvVars(item, env, logger);
    }
    return result;
  }
  return value;
}

function readObject(value: unknown, path: string): Record<string, unknown> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', path, value);
  }
  return value;
}

interface NumberRule {
  integer?: boolean;
  min?: number;
  /** Whether the minimum itself is excluded */
  exclusive?: boolean;
  max?: number;
}

function readNumber(value: unknown, path: string, rule: NumberRule = {}): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw new ConfigValidationError('must be a number', path, value);
  }
  if (rule.integer === true && !Number.isInteger(n)) {
    throw new ConfigValidationError('must be an integer', path, value);
  }
  if (rule.min !== undefined && (rule.exclusive === true ? n <= rule.min : n < rule.min)) {
    throw new ConfigValidationError(`must be ${rule.exclusive === true ? '>' : '>='} ${rule.min}`, path, value);
  }
  if (rule.max !== undefined && n > rule.max) {
    throw new ConfigValidationError(`must be <= ${rule.max}`, path, value);
  }
  return n;
}

const DELAY_RULE: NumberRule = { min: 0, exclusive: true, max: MAX_TIMER_DELAY_MS };

function readTimeout(value: unknown, path: string): number | null | undefined {
  if (value === null || value === 'none') {
    return null;
  }
  return readNumber(value, path, DELAY_RULE);
}

function readBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  throw new ConfigValidationError('must be a boolean', path, value);
}

function readEnum<T extends string>(value: unknown, allowed: readonly T[], path: string): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigValidationError(`must be one of: ${allowed.join(', ')}`, path, value);
  }
  return match;
}

const RETRY_MODES: readonly RetryMode[] = ['transient-only', 'all'];
const BACKOFF_KINDS = ['fixed', 'exponential'] as const;

function parseBackoff(value: unknown, path: string): BackoffConfig {
  const c = readObject(value, path);
  const kind = readEnum(c['kind'], BACKOFF_KINDS, `${path}.kind`) ?? 'fixed';

  if (kind === 'fixed') {
    return {
      kind,
      delayMs: readNumber(c['delayMs'], `${path}.delayMs`, { min: 0, max: MAX_TIMER_DELAY_MS }) ?? 100,
    };
  }
  return {
    kind,
    initialDelayMs:
      readNumber(c['initialDelayMs'], `${path}.initialDelayMs`, { min: 0, max: MAX_TIMER_DELAY_MS }) ??
      DEFAULT_EXPONENTIAL_BACKOFF_CONFIG.initialDelayMs,
    maxDelayMs:
      readNumber(c['maxDelayMs'], `${path}.maxDelayMs`, DELAY_RULE) ??
      DEFAULT_EXPONENTIAL_BACKOFF_CONFIG.maxDelayMs,
    multiplier:
      readNumber(c['multiplier'], `${path}.multiplier`, { min: 1 }) ?? DEFAULT_EXPONENTIAL_BACKOFF_CONFIG.multiplier,
  };
}

function parseExecutor(value: unknown, path = 'executor'): ExecutorSettings {
  const c = readObject(value, path);
  const defaults = DEFAULT_CONFIG.executor;
  const timeoutMs = readTimeout(c['timeoutMs'], `${path}.timeoutMs`);

  return {
    timeoutMs: timeoutMs === undefined ? defaults.timeoutMs : timeoutMs,
    maxRetries: readNumber(c['maxRetries'], `${path}.maxRetries`, { integer: true, min: 0 }) ?? defaults.maxRetries,
    backoff: c['backoff'] === undefined ? { ...defaults.backoff } : parseBackoff(c['backoff'], `${path}.backoff`),
    retryMode: readEnum(c['retryMode'], RETRY_MODES, `${path}.retryMode`) ?? defaults.retryMode,
    enableLogging: readBoolean(c['enableLogging'], `${path}.enableLogging`) ?? defaults.enableLogging,
    enableMonitoring: readBoolean(c['enableMonitoring'], `${path}.enableMonitoring`) ?? defaults.enableMonitoring,
  };
}

function parseLogging(value: unknown, path = 'logging'): LoggingConfig {
  const c = readObject(value, path);
  let name = DEFAULT_CONFIG.logging.name;
  const rawName = c['name'];
  if (rawName !== undefined) {
    if (typeof rawName !== 'string' || rawName === '') {
      throw new ConfigValidationError('name must be a non-empty string', `${path}.name`, rawName);
    }
    name = rawName;
  }
  return {
    level: readEnum<LogLevel>(c['level'], LOG_LEVELS, `${path}.level`) ?? DEFAULT_CONFIG.logging.level,
    name,
  };
}

function parseTools(value: unknown, path = 'tools'): Record<string, ToolSettings> {
  const tools: Record<string, ToolSettings> = {};
  for (const [name, raw] of Object.entries(readObject(value, path))) {
    const toolPath = `${path}.${name}`;
    const c = readObject(raw, toolPath);
    const settings: ToolSettings = {};

    const enabled = readBoolean(c['enabled'], `${toolPath}.enabled`);
    if (enabled !== undefined) settings.enabled = enabled;
    const timeoutMs = readTimeout(c['timeoutMs'], `${toolPath}.timeoutMs`);
    if (timeoutMs !== undefined) settings.timeoutMs = timeoutMs;
    const retries = readNumber(c['retries'], `${toolPath}.retries`, { integer: true, min: 0 });
    if (retries !== undefined) settings.retries = retries;

    tools[name] = settings;
  }
  return tools;
}

/**
 * Validate a parsed document and apply defaults.
 *
 * @throws ConfigValidationError
 */
export function parseConfig(raw: unknown): AppConfig {
  const c = readObject(raw, '');
  return {
    executor: parseExecutor(c['executor']),
    logging: parseLogging(c['logging']),
    tools: parseTools(c['tools']),
  };
}

/**
 * Load configuration from a YAML file.
 *
 * A missing file yields the defaults (with a warning).
 *
 * @throws ConfigValidationError when the file does not parse or validate
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? stderrLogger();
  const configPath = options.configPath ?? env['CONFIG_PATH'] ?? DEFAULT_CONFIG_PATH;
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    logger.warn({ path: absolutePath }, 'Config file not found, using defaults');
    return parseConfig({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigValidationError(
      `failed to parse config file: ${err instanceof Error ? err.message : String(err)}`,
      absolutePath,
      undefined,
    );
  }

  return parseConfig(substituteEnvVars(parsed, env, logger));
}

/**
 * Executor configuration described by an AppConfig.
 */
export function toExecutionConfig(config: AppConfig): ExecutionConfig {
  const toolOverrides: Record<string, ToolOverride> = {};
  for (const [name, settings] of Object.entries(config.tools)) {
    const override: ToolOverride = {};
    if (settings.enabled !== undefined) override.enabled = settings.enabled;
    if (settings.timeoutMs !== undefined) override.timeoutMs = settings.timeoutMs;
    if (settings.retries !== undefined) override.maxRetries = settings.retries;
    toolOverrides[name] = override;
  }

  const { executor } = config;
  return {
    timeoutMs: executor.timeoutMs,
    maxRetries: executor.maxRetries,
    backoff: { ...executor.backoff },
    retryMode: executor.retryMode,
    enableLogging: executor.enableLogging,
    enableMonitoring: executor.enableMonitoring,
    toolOverrides,
  };
}
