/**
 * Conversion between tool values and structured documents.
 *
 * Serialisation is lossless for null, booleans, finite numbers, strings,
 * arrays and plain objects; Dates become ISO strings and `undefined`
 * object properties are dropped. Everything else is rejected rather than
 * silently changed.
 */

import { isRecord, type JsonObject, type JsonValue } from '../types/json.js';

export class SerializationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(path ? `${message} at '${path}'` : message);
    this.name = 'SerializationError';
  }
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isPlainObject(value) && isJsonValue(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert a tool's output into a structured document.
 *
 * @throws SerializationError when the value holds something a document cannot represent
 */
export function toStructuredValue(value: unknown): JsonValue {
  return convert(value, '', new Set<object>());
}

function convert(value: unknown, path: string, seen: Set<object>): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(`non-finite number ${String(value)}`, path);
    }
    return value;
  }
  if (value === undefined) {
    // Top-level `undefined` (a tool returning nothing) maps to null.
    if (path === '') return null;
    throw new SerializationError('undefined value', path);
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationError('invalid date', path);
    }
    return value.toISOString();
  }
  if (typeof value !== 'object') {
    throw new SerializationError(`unsupported ${typeof value} value`, path);
  }
  if (seen.has(value)) {
    throw new SerializationError('circular reference', path);
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => convert(item, `${path}/${index}`, seen));
    }
    if (!isPlainObject(value)) {
      throw new SerializationError(`unsupported object ${Object.prototype.toString.call(value)}`, path);
    }
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      out[key] = convert(item, `${path}/${key}`, seen);
    }
    return out;
  } finally {
    seen.delete(value);
  }
}
