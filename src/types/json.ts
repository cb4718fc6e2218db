/**
 * Structured document types.
 *
 * A structured document is the untyped payload exchanged on the dispatch
 * boundary: tool arguments going in, serialised tool output coming out.
 */

export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A JSON Schema describing a tool's valid input.
 */
export type SchemaDocument = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
