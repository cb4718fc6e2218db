/**
 * ToolExecutor: uniform timeout, retry, logging and monitoring policy for
 * every tool invocation.
 *
 * Per invocation: lookup → decode/validate → attempts 1..1+maxRetries, each
 * bounded by the (per-tool) timeout, with backoff between attempts. Lookup
 * and validation failures end the invocation at once. `execute` never
 * rejects; every failure is reported in the returned ExecutionResult.
 */

import { ToolError, toToolError } from '../errors/ToolError.js';
import { shouldRetry, type RetryMode } from '../errors/RetryPolicy.js';
import { createLogger, silentLogger, type Logger } from '../logging/logger.js';
import { MetricsCollector } from '../monitoring/MetricsCollector.js';
import type { ToolRegistry } from '../registry/ToolRegistry.js';
import type { PreparedCall } from '../tools/ToolAdapter.js';
import type { JsonValue } from '../types/json.js';
import {
  DEFAULT_EXECUTION_CONFIG,
  assertPositiveDelay,
  computeBackoffDelay,
  freezeExecutionConfig,
  resolveToolPolicy,
  type BackoffPolicy,
  type ExecutionConfig,
  type ToolOverride,
} from './ExecutionConfig.js';
import type { ExecutionResult } from './ExecutionResult.js';
import { runWithTimeout, sleep } from './timeout.js';

export interface ExecutionRequest {
  toolName: string;
  input: unknown;
}

export interface ToolExecutorOptions {
  /** Used when `enableLogging` is set (default: a new 'tool-engine' logger) */
  logger?: Logger;
  /** Used when `enableMonitoring` is set (default: a private collector) */
  metrics?: MetricsCollector;
}

type Outcome = { ok: true; value: JsonValue } | { ok: false; error: ToolError };

interface Dispatch {
  toolName: string;
  outcome: Outcome;
  attempts: number;
  durationMs: number;
  startedAt: string;
  metadata: Record<string, JsonValue>;
}

export class ToolExecutor {
  readonly registry: ToolRegistry;
  readonly config: Readonly<ExecutionConfig>;
  private readonly logger: Logger;
  private readonly collector: MetricsCollector | undefined;

  /**
   * @throws RangeError when a configured number is out of range
   */
  constructor(registry: ToolRegistry, config: Partial<ExecutionConfig> = {}, options: ToolExecutorOptions = {}) {
    this.registry = registry;
    this.config = freezeExecutionConfig({ ...DEFAULT_EXECUTION_CONFIG, ...config });

    const base = this.config.enableLogging ? (options.logger ?? createLogger({ name: 'tool-engine' })) : silentLogger();
    this.logger = base.child({ component: 'ToolExecutor' });
    this.collector = this.config.enableMonitoring ? (options.metrics ?? new MetricsCollector()) : undefined;
  }

  static builder(registry: ToolRegistry): ExecutorBuilder {
    return new ExecutorBuilder(registry);
  }

  /** The collector receiving execution events, when monitoring is enabled. */
  get metrics(): MetricsCollector | undefined {
    return this.collector;
  }

  async execute(toolName: string, input: unknown): Promise<ExecutionResult> {
    return toResult(await this.dispatch(toolName, input));
  }

  /** Inbound entry point for orchestration loops; same as `execute`. */
  async invoke(toolName: string, args: unknown): Promise<ExecutionResult> {
    return this.execute(toolName, args);
  }

  /**
   * Like `execute`, but resolves to the bare result.
   *
   * @throws ToolError the terminal failure
   */
  async executeSimple(toolName: string, input: unknown): Promise<JsonValue> {
    const { outcome } = await this.dispatch(toolName, input);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  /**
   * Start every request at once. The i-th result belongs to the i-th request.
   */
  async executeParallel(requests: readonly ExecutionRequest[]): Promise<ExecutionResult[]> {
    this.collector?.recordParallelExecution(requests.length);
    this.logger.debug({ count: requests.length }, 'Executing tools in parallel');
    return Promise.all(requests.map((request) => this.execute(request.toolName, request.input)));
  }

  /**
   * Bound the whole invocation (all attempts and backoff) by `overallMs`.
   *
   * @throws RangeError when `overallMs` is not a usable timer delay
   */
  async executeWithTimeout(toolName: string, input: unknown, overallMs: number): Promise<ExecutionResult> {
    assertPositiveDelay(overallMs, 'overallMs');
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(ToolError.timeout(toolName, overallMs)), overallMs);
    try {
      return toResult(await this.dispatch(toolName, input, controller.signal));
    } finally {
      clearTimeout(timer);
    }
  }

  private async dispatch(toolName: string, input: unknown, deadline?: AbortSignal): Promise<Dispatch> {
    const started = performance.now();
    const startedAt = new Date().toISOString();
    let attempts = 0;
    let metadata: Record<string, JsonValue> = {};

    const finish = (outcome: Outcome): Dispatch => {
      const dispatch: Dispatch = {
        toolName,
        outcome,
        attempts,
        durationMs: performance.now() - started,
        startedAt,
        metadata,
      };
      this.record(dispatch);
      return dispatch;
    };
    const fail = (err: unknown): Dispatch => finish({ ok: false, error: toToolError(err, toolName) });

    const handle = this.registry.lookup(toolName);
    const policy = resolveToolPolicy(this.config, toolName);
    if (handle === undefined || !handle.metadata.enabled || !policy.enabled) {
      return fail(ToolError.notFound(toolName));
    }
    metadata = { toolVersion: handle.metadata.version };

    let call: PreparedCall;
    try {
      call = handle.prepare(input);
    } catch (err) {
      return fail(err);
    }

    const { timeoutMs, maxRetries } = policy;
    for (;;) {
      attempts += 1;
      const attempt = attempts;
      const logger = this.logger.child({ tool: toolName, attempt });
      logger.debug('Attempt started');

      try {
        const value = await runWithTimeout(
          (signal) => call.run({ signal, attempt, toolName, logger }),
          {
            timeoutMs,
            onTimeout: () => ToolError.timeout(toolName, timeoutMs ?? 0),
            parentSignal: deadline,
            onLateSettlement: (outcome) => logger.debug({ outcome }, 'Abandoned attempt settled'),
          },
        );
        return finish({ ok: true, value });
      } catch (err) {
        if (deadline !== undefined && isAborted(deadline)) {
          return fail(deadline.reason);
        }
        const error = toToolError(err, toolName);
        if (attempt > maxRetries || !shouldRetry(error, this.config.retryMode)) {
          return fail(error);
        }

        const delayMs = computeBackoffDelay(this.config.backoff, attempt);
        logger.warn({ err: error, delayMs }, 'Attempt failed, retrying');
        try {
          await sleep(delayMs, deadline);
        } catch (sleepErr) {
          return fail(deadline !== undefined && isAborted(deadline) ? deadline.reason : sleepErr);
        }
      }
    }
  }

  private record(dispatch: Dispatch): void {
    const { toolName, outcome, attempts, durationMs } = dispatch;
    if (outcome.ok) {
      this.logger.info({ tool: toolName, attempts, durationMs }, 'Tool execution succeeded');
    } else {
      this.logger.warn(
        { tool: toolName, attempts, durationMs, kind: outcome.error.kind, err: outcome.error },
        'Tool execution failed',
      );
    }
    this.collector?.recordExecution({
      toolName,
      success: outcome.ok,
      durationMs,
      errorKind: outcome.ok ? undefined : outcome.error.kind,
    });
  }
}

// Read through a call so an earlier check does not narrow it.
function isAborted(signal: AbortSignal): boolean {
  return signal.aborted;
}

function toResult(dispatch: Dispatch): ExecutionResult {
  const { toolName, outcome, attempts, durationMs, startedAt, metadata } = dispatch;
  const base = {
    toolName,
    durationMs,
    attempts,
    retries: Math.max(0, attempts - 1),
    startedAt,
    metadata,
  };
  return outcome.ok
    ? { ...base, success: true, result: outcome.value }
    : { ...base, success: false, error: outcome.error.message, errorKind: outcome.error.kind };
}

/**
 * Fluent executor construction.
 *
 * ```ts
 * const executor = ToolExecutor.builder(registry)
 *   .timeout(5_000)
 *   .retries(2)
 *   .backoff(exponentialBackoff({ initialDelayMs: 50 }))
 *   .build();
 * ```
 */
export class ExecutorBuilder {
  private settings: Partial<ExecutionConfig> = {};
  private readonly overrides: Record<string, ToolOverride> = {};
  private options: ToolExecutorOptions = {};

  constructor(private readonly registry: ToolRegistry) {}

  timeout(ms: number): this {
    this.settings.timeoutMs = ms;
    return this;
  }

  noTimeout(): this {
    this.settings.timeoutMs = null;
    return this;
  }

  retries(maxRetries: number): this {
    this.settings.maxRetries = maxRetries;
    return this;
  }

  backoff(policy: BackoffPolicy): this {
    this.settings.backoff = policy;
    return this;
  }

  retryMode(mode: RetryMode): this {
    this.settings.retryMode = mode;
    return this;
  }

  logging(enabled: boolean): this {
    this.settings.enableLogging = enabled;
    return this;
  }

  /** Also turns logging on. */
  logger(logger: Logger): this {
    this.options = { ...this.options, logger };
    this.settings.enableLogging = true;
    return this;
  }

  /** Turns monitoring on, recording into `collector` (or a private one). */
  monitoring(collector?: MetricsCollector): this {
    this.settings.enableMonitoring = true;
    if (collector !== undefined) {
      this.options = { ...this.options, metrics: collector };
    }
    return this;
  }

  toolOverride(toolName: string, override: ToolOverride): this {
    this.overrides[toolName] = { ...this.overrides[toolName], ...override };
    return this;
  }

  /** Merge a partial configuration; builder calls made after it win. */
  config(partial: Partial<ExecutionConfig>): this {
    const { toolOverrides, ...rest } = partial;
    this.settings = { ...this.settings, ...rest };
    for (const [name, override] of Object.entries(toolOverrides ?? {})) {
      this.toolOverride(name, override);
    }
    return this;
  }

  build(): ToolExecutor {
    return new ToolExecutor(this.registry, { ...this.settings, toolOverrides: { ...this.overrides } }, this.options);
  }
}
