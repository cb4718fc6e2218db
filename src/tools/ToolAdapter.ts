/**
 * Type erasure at the registry boundary.
 *
 * Each registered tool is wrapped once in a ToolHandle. The handle keeps the
 * tool's concrete input and output types inside closures: `prepare` turns a
 * structured document into a typed input (decode, then validate) and returns
 * a call that runs the typed `execute` and serialises what it produces. The
 * registry and executor only ever see handles.
 */

import type { z } from 'zod';
import { ToolError, isToolError, toToolError } from '../errors/ToolError.js';
import type { JsonValue, SchemaDocument } from '../types/json.js';
import { SerializationError, toStructuredValue } from './serialization.js';
import type { Tool, ToolContext } from './Tool.js';
import { createToolMetadata, type ToolMetadata } from './ToolMetadata.js';

/**
 * A decoded and validated invocation, ready to run.
 */
export interface PreparedCall {
  run(context: ToolContext): Promise<JsonValue>;
}

export interface ToolHandle {
  readonly metadata: ToolMetadata;
  /**
   * Decode and validate a structured document.
   *
   * @throws ToolError (InvalidParameters) when the document is rejected
   */
  prepare(document: unknown): PreparedCall;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function rejectInput(toolName: string, err: unknown): ToolError {
  return isToolError(err) ? toToolError(err, toolName) : ToolError.invalidParameters(toolName, messageOf(err), err);
}

function serializeOutput<O>(toolName: string, output: O, outputType: z.ZodType<O> | undefined): JsonValue {
  let value: unknown = output;
  if (outputType !== undefined) {
    const parsed = outputType.safeParse(output);
    if (!parsed.success) {
      throw ToolError.executionFailed(toolName, `output does not match its declared type: ${parsed.error.message}`, {
        transient: false,
        cause: parsed.error,
      });
    }
    value = parsed.data;
  }

  try {
    return toStructuredValue(value);
  } catch (err) {
    if (err instanceof SerializationError) {
      throw ToolError.executionFailed(toolName, `output is not serialisable: ${err.message}`, {
        transient: false,
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * Wrap a typed tool in an erased handle.
 *
 * @throws ToolError (InvalidParameters) for an empty name or an input schema that cannot be derived
 */
export function createToolHandle<I, O>(tool: Tool<I, O>): ToolHandle {
  let inputSchema: SchemaDocument;
  try {
    inputSchema = tool.input.schema();
  } catch (err) {
    throw ToolError.invalidParameters(tool.name, `cannot derive input schema: ${messageOf(err)}`, err);
  }

  const metadata = createToolMetadata(tool, inputSchema);
  const { name } = metadata;

  return Object.freeze({
    metadata,
    prepare(document: unknown): PreparedCall {
      let input: I;
      try {
        input = tool.input.decode(document, name);
        tool.validate?.(input);
      } catch (err) {
        throw rejectInput(name, err);
      }

      return {
        async run(context: ToolContext): Promise<JsonValue> {
          const output = await tool.execute(input, context);
          return serializeOutput(name, output, tool.output);
        },
      };
    },
  });
}
