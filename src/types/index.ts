/**
 * Type exports for tool-engine.
 */

export { isRecord } from './json.js';
export type { JsonPrimitive, JsonValue, JsonObject, SchemaDocument } from './json.js';
