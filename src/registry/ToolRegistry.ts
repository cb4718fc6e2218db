/**
 * ToolRegistry: directory of tools by name.
 *
 * Entries are erased ToolHandles (see tools/ToolAdapter). An entry is built
 * and frozen completely before the single `Map.set` that publishes it, so a
 * reader sees either no entry or a whole one. Handles are invoked outside
 * the registry; nothing here awaits.
 */

import { ToolError, isToolError, toToolError } from '../errors/ToolError.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { MetricsCollector } from '../monitoring/MetricsCollector.js';
import type { Tool } from '../tools/Tool.js';
import { createToolHandle, type ToolHandle } from '../tools/ToolAdapter.js';
import { createToolMetadata, toListing, type ToolListing, type ToolMetadata } from '../tools/ToolMetadata.js';
import type { SchemaDocument } from '../types/json.js';

export interface ToolRegistryOptions {
  logger?: Logger;
  /** Counts registrations and removals */
  metrics?: MetricsCollector;
}

export interface ListToolsOptions {
  /** Include tools whose metadata marks them disabled (default: false) */
  includeDisabled?: boolean;
}

export class ToolRegistry implements Iterable<string> {
  private readonly entries = new Map<string, ToolHandle>();
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector | undefined;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'ToolRegistry' });
    this.metrics = options.metrics;
  }

  static builder(options?: ToolRegistryOptions): RegistryBuilder {
    return new RegistryBuilder(new ToolRegistry(options), options?.logger);
  }

  /**
   * Register a tool under its name.
   *
   * @throws ToolError AlreadyExists when the name is taken (the existing entry is kept),
   *   InvalidParameters when the tool's name or schema is unusable
   */
  register<I, O>(tool: Tool<I, O>): ToolMetadata {
    this.ensureAvailable(tool.name);

    let handle: ToolHandle;
    try {
      handle = createToolHandle(tool);
    } catch (err) {
      throw isToolError(err)
        ? toToolError(err, tool.name)
        : ToolError.invalidParameters(tool.name, err instanceof Error ? err.message : String(err), err);
    }
    return this.insert(handle);
  }

  /**
   * Register an already-erased handle. Its metadata is copied and frozen;
   * later changes to the caller's objects do not reach the registry.
   *
   * @throws ToolError AlreadyExists when the name is taken,
   *   InvalidParameters when the name is empty
   */
  registerHandle(handle: ToolHandle): ToolMetadata {
    const { metadata: source } = handle;
    const metadata = createToolMetadata(
      {
        name: source.name,
        description: source.description,
        version: source.version,
        tags: source.tags,
        enabled: source.enabled,
        extra: source.extra,
        ...(source.author !== undefined ? { author: source.author } : {}),
      },
      source.inputSchema,
    );
    this.ensureAvailable(metadata.name);
    return this.insert(Object.freeze({ metadata, prepare: handle.prepare.bind(handle) }));
  }

  lookup(name: string): ToolHandle | undefined {
    return this.entries.get(name);
  }

  metadata(name: string): ToolMetadata | undefined {
    return this.entries.get(name)?.metadata;
  }

  inputSchema(name: string): SchemaDocument | undefined {
    return this.entries.get(name)?.metadata.inputSchema;
  }

  hasTool(name: string): boolean {
    return this.entries.has(name);
  }

  /** Registered names, in registration order. */
  toolNames(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  findByTag(tag: string): string[] {
    return this.allMetadata()
      .filter((m) => m.tags.includes(tag))
      .map((m) => m.name);
  }

  enabledTools(): string[] {
    return this.allMetadata()
      .filter((m) => m.enabled)
      .map((m) => m.name);
  }

  allMetadata(): ToolMetadata[] {
    return Array.from(this.entries.values(), (handle) => handle.metadata);
  }

  /**
   * Tools as advertised to introspection callers (enabled only unless asked).
   */
  listTools(options: ListToolsOptions = {}): ToolListing[] {
    return this.allMetadata()
      .filter((m) => options.includeDisabled === true || m.enabled)
      .map(toListing);
  }

  /**
   * @throws ToolError NotFound when nothing is registered under `name`
   */
  unregister(name: string): ToolMetadata {
    const handle = this.entries.get(name);
    if (handle === undefined) {
      throw ToolError.notFound(name);
    }
    this.entries.delete(name);
    this.metrics?.recordRegistryOperation();
    this.logger.debug({ tool: name }, 'Tool unregistered');
    return handle.metadata;
  }

  clear(): void {
    this.entries.clear();
    this.metrics?.recordRegistryOperation();
    this.logger.debug('Registry cleared');
  }

  [Symbol.iterator](): Iterator<string> {
    return this.entries.keys();
  }

  private ensureAvailable(name: string): void {
    if (this.entries.has(name)) {
      throw ToolError.alreadyExists(name);
    }
  }

  private insert(handle: ToolHandle): ToolMetadata {
    const { metadata } = handle;
    this.ensureAvailable(metadata.name);
    this.entries.set(metadata.name, handle);
    this.metrics?.recordRegistryOperation();
    this.logger.debug({ tool: metadata.name, version: metadata.version }, 'Tool registered');
    return metadata;
  }
}

/**
 * Thrown by `RegistryBuilder.addTool`. Not a ToolError; the ToolError is its `cause`.
 */
export class RegistrationAbortedError extends Error {
  constructor(cause: ToolError) {
    super(`Tool registration aborted: ${cause.message}`, { cause });
    this.name = 'RegistrationAbortedError';
  }
}

export interface RejectedRegistration {
  name: string;
  error: ToolError;
}

/**
 * Fluent registry construction. The three adders differ only in what they
 * do with a failed `register`.
 */
export class RegistryBuilder {
  /** Failures dropped by `tryAddTool`, in order. */
  readonly rejected: RejectedRegistration[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly registry: ToolRegistry,
    logger?: Logger,
  ) {
    this.logger = (logger ?? silentLogger()).child({ component: 'RegistryBuilder' });
  }

  /** Strict: the ToolError reaches the caller. */
  withTool<I, O>(tool: Tool<I, O>): this {
    this.registry.register(tool);
    return this;
  }

  /** Fatal: any failure is a RegistrationAbortedError. For prototypes and tests. */
  addTool<I, O>(tool: Tool<I, O>): this {
    try {
      this.registry.register(tool);
    } catch (err) {
      throw new RegistrationAbortedError(toToolError(err, tool.name));
    }
    return this;
  }

  /** Best-effort: failures are recorded in `rejected` and construction continues. */
  tryAddTool<I, O>(tool: Tool<I, O>): this {
    try {
      this.registry.register(tool);
    } catch (err) {
      const error = toToolError(err, tool.name);
      this.rejected.push({ name: tool.name, error });
      this.logger.debug({ tool: tool.name, err: error }, 'Tool registration skipped');
    }
    return this;
  }

  build(): ToolRegistry {
    return this.registry;
  }
}
