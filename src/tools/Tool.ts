/**
 * The tool contract.
 *
 * A tool is a named capability with one typed input and one typed output.
 * Its input codec describes (schema) and decodes (deserialises) the
 * untyped document it is invoked with; the registry erases the concrete
 * types behind a uniform handle (see ToolAdapter).
 */

import type { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import type { JsonValue, SchemaDocument } from '../types/json.js';

/**
 * Describes and decodes a tool's input.
 *
 * `schema()` must be pure; it is called once when the tool is registered.
 * `decode()` throws a ToolError (InvalidParameters) when the document does
 * not match.
 */
export interface InputCodec<I> {
  schema(): SchemaDocument;
  decode(document: unknown, toolName: string): I;
}

/**
 * Per-attempt context handed to `execute`.
 */
export interface ToolContext {
  /** Aborted when the attempt exceeds its timeout. */
  readonly signal: AbortSignal;
  /** 1-based attempt number within the current invocation. */
  readonly attempt: number;
  readonly toolName: string;
  readonly logger: Logger;
}

/**
 * Descriptive fields a tool declares about itself.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  version?: string;
  author?: string;
  tags?: readonly string[];
  enabled?: boolean;
  /** Free-form annotations copied into the registered metadata. */
  extra?: Record<string, JsonValue>;
}

export interface Tool<I, O> extends ToolDescriptor {
  readonly input: InputCodec<I>;
  /** When present, results are parsed through it before serialisation. */
  readonly output?: z.ZodType<O>;
  /**
   * Semantic checks beyond the schema. Throw to reject; a non-ToolError
   * becomes InvalidParameters.
   */
  validate?(input: I): void;
  execute(input: I, context: ToolContext): Promise<O>;
}

