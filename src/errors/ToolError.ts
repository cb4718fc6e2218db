/**
 * ToolError: the closed error taxonomy of the engine.
 *
 * Every failure the registry or executor reports is a ToolError carrying
 * its kind and whatever context was known at the point of failure (tool
 * name, timeout, operation). Tool code may throw these directly; anything
 * else thrown by a tool is normalised through `toToolError`.
 */

export type ToolErrorKind =
  | 'NotFound'
  | 'InvalidParameters'
  | 'ExecutionFailed'
  | 'TimeoutError'
  | 'AlreadyExists'
  | 'Unknown';

export interface ToolErrorOptions {
  toolName?: string | undefined;
  operation?: string | undefined;
  timeoutMs?: number | undefined;
  /**
   * `true` marks an execution failure as worth retrying, `false` as one no
   * retry can change. Left unset, the message decides.
   */
  transient?: boolean | undefined;
  cause?: unknown;
}

export class ToolError extends Error {
  readonly kind: ToolErrorKind;
  readonly toolName: string | undefined;
  readonly operation: string | undefined;
  readonly timeoutMs: number | undefined;
  readonly transient: boolean | undefined;
  /** The message without the kind prefix. */
  readonly detail: string;

  constructor(kind: ToolErrorKind, detail: string, options: ToolErrorOptions = {}) {
    super(formatMessage(kind, detail, options), options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ToolError';
    this.kind = kind;
    this.detail = detail;
    this.toolName = options.toolName;
    this.operation = options.operation;
    this.timeoutMs = options.timeoutMs;
    this.transient = options.transient ?? (kind === 'TimeoutError' ? true : undefined);
  }

  static notFound(name: string): ToolError {
    return new ToolError('NotFound', name, { toolName: name });
  }

  static alreadyExists(name: string): ToolError {
    return new ToolError('AlreadyExists', name, { toolName: name });
  }

  static invalidParameters(toolName: string | undefined, message: string, cause?: unknown): ToolError {
    return new ToolError('InvalidParameters', message, { toolName, cause });
  }

  static executionFailed(
    toolName: string | undefined,
    message: string,
    options: { transient?: boolean; cause?: unknown } = {},
  ): ToolError {
    return new ToolError('ExecutionFailed', message, { toolName, ...options });
  }

  static timeout(toolName: string | undefined, timeoutMs: number): ToolError {
    return new ToolError('TimeoutError', `${timeoutMs}ms`, { toolName, timeoutMs });
  }

  static unknown(message: string, cause?: unknown): ToolError {
    return new ToolError('Unknown', message, { cause });
  }
}

function formatMessage(kind: ToolErrorKind, detail: string, options: ToolErrorOptions): string {
  const tool = options.toolName ?? 'unknown';
  switch (kind) {
    case 'NotFound':
      return `Tool '${options.toolName ?? detail}' not found`;
    case 'AlreadyExists':
      return `Tool '${options.toolName ?? detail}' is already registered`;
    case 'InvalidParameters':
      return `Invalid parameters for tool '${tool}': ${detail}`;
    case 'ExecutionFailed':
      return `Tool '${tool}' execution failed: ${detail}`;
    case 'TimeoutError':
      return `Tool '${tool}' timed out after ${options.timeoutMs ?? detail}ms`;
    case 'Unknown':
      return `Unknown error: ${detail}`;
  }
}

export function isToolError(value: unknown): value is ToolError {
  return value instanceof ToolError;
}

/**
 * Normalise anything thrown across the tool boundary.
 *
 * A ToolError keeps its kind (and gains the tool name when it had none),
 * an Error becomes ExecutionFailed, any other thrown value becomes Unknown.
 */
export function toToolError(value: unknown, toolName?: string): ToolError {
  if (value instanceof ToolError) {
    if (value.toolName !== undefined || toolName === undefined) {
      return value;
    }
    return new ToolError(value.kind, value.detail, {
      toolName,
      operation: value.operation,
      timeoutMs: value.timeoutMs,
      transient: value.transient,
      cause: value.cause,
    });
  }
  if (value instanceof Error) {
    return ToolError.executionFailed(toolName, value.message, { cause: value });
  }
  return new ToolError('Unknown', describeThrown(value), { toolName, cause: value });
}

function describeThrown(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
  } catch {
    return String(value);
  }
}

/**
 * Fluent error builder carrying tool/operation context.
 *
 * ```ts
 * throw errorContext().withTool('calculator').executionFailed('Division by zero');
 * ```
 */
export class ErrorContext {
  private toolName: string | undefined;
  private operation: string | undefined;

  withTool(toolName: string): this {
    this.toolName = toolName;
    return this;
  }

  withOperation(operation: string): this {
    this.operation = operation;
    return this;
  }

  notFound(): ToolError {
    return new ToolError('NotFound', this.toolName ?? 'unknown', this.options());
  }

  alreadyExists(): ToolError {
    return new ToolError('AlreadyExists', this.toolName ?? 'unknown', this.options());
  }

  invalidParameters(message: string): ToolError {
    return new ToolError('InvalidParameters', message, this.options());
  }

  executionFailed(message: string, transient?: boolean): ToolError {
    return new ToolError('ExecutionFailed', message, { ...this.options(), transient });
  }

  timeout(timeoutMs: number): ToolError {
    return new ToolError('TimeoutError', `${timeoutMs}ms`, { ...this.options(), timeoutMs });
  }

  unknown(message: string): ToolError {
    return new ToolError('Unknown', message, this.options());
  }

  private options(): ToolErrorOptions {
    return { toolName: this.toolName, operation: this.operation };
  }
}

export function errorContext(): ErrorContext {
  return new ErrorContext();
}
