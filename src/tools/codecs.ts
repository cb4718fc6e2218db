/**
 * Input codecs: typed (zod) and schema-first (JSON Schema + Ajv).
 */

import { z } from 'zod';
import type { SchemaObject } from 'ajv';
import { ToolError } from '../errors/ToolError.js';
import { defaultValidator, type AjvValidator } from '../validation/AjvValidator.js';
import { formatValidationErrors } from '../validation/types.js';
import type { JsonObject, SchemaDocument } from '../types/json.js';
import { isJsonObject } from './serialization.js';
import type { InputCodec } from './Tool.js';

/**
 * One-line summary of zod issues, `path: message` joined by "; ".
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Codec for a zod-typed input. The advertised schema is the JSON Schema of
 * the input side of the zod type.
 */
export function zodInput<S extends z.ZodType>(schema: S): InputCodec<z.output<S>> {
  return {
    schema(): SchemaDocument {
      return z.toJSONSchema(schema, { io: 'input', unrepresentable: 'any' });
    },
    decode(document, toolName) {
      const parsed = schema.safeParse(document);
      if (!parsed.success) {
        throw ToolError.invalidParameters(toolName, formatZodIssues(parsed.error), parsed.error);
      }
      return parsed.data;
    },
  };
}

/**
 * Codec for a schema-first input. Arguments must be an object document
 * that satisfies `schema`.
 *
 * @throws ToolError (InvalidParameters) when `schema` does not compile
 */
export function jsonSchemaInput(
  schema: SchemaDocument,
  validator: AjvValidator = defaultValidator(),
): InputCodec<JsonObject> {
  const document: SchemaObject = schema;
  const schemaError = validator.checkSchema(document);
  if (schemaError !== undefined) {
    throw ToolError.invalidParameters(undefined, `invalid input schema: ${schemaError}`);
  }
  const check = validator.compile(document);

  return {
    schema: () => schema,
    decode(value, toolName) {
      if (!isJsonObject(value)) {
        throw ToolError.invalidParameters(toolName, 'arguments must be an object');
      }
      const result = check(value);
      if (!result.valid) {
        throw ToolError.invalidParameters(toolName, formatValidationErrors(result.errors));
      }
      return value;
    },
  };
}
