import { ToolError } from '../errors/ToolError.js';
import type { JsonValue, SchemaDocument } from '../types/json.js';
import type { ToolDescriptor } from './Tool.js';

export const DEFAULT_TOOL_VERSION = '1.0.0';

/**
 * Descriptive record of a registered tool. Frozen at registration.
 */
export interface ToolMetadata {
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly author: string | undefined;
  readonly tags: readonly string[];
  readonly enabled: boolean;
  readonly inputSchema: SchemaDocument;
  readonly extra: Readonly<Record<string, JsonValue>>;
}

/**
 * Advertised form of a tool, as handed to introspection callers.
 */
export interface ToolListing {
  name: string;
  description: string;
  inputSchema: SchemaDocument;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build the frozen metadata for a tool from its descriptor and schema.
 *
 * The schema is copied before freezing so the tool's own object is left alone.
 */
export function createToolMetadata(descriptor: ToolDescriptor, inputSchema: SchemaDocument): ToolMetadata {
  const { name } = descriptor;
  if (name.trim() === '') {
    throw ToolError.invalidParameters(undefined, 'tool name must not be empty');
  }

  return deepFreeze({
    name,
    description: descriptor.description,
    version: descriptor.version ?? DEFAULT_TOOL_VERSION,
    author: descriptor.author,
    tags: [...new Set(descriptor.tags ?? [])],
    enabled: descriptor.enabled ?? true,
    inputSchema: structuredClone(inputSchema),
    extra: structuredClone(descriptor.extra ?? {}),
  });
}

export function toListing(metadata: ToolMetadata): ToolListing {
  return {
    name: metadata.name,
    description: metadata.description,
    inputSchema: metadata.inputSchema,
  };
}
