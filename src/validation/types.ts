/**
 * Types for the validation module.
 *
 * Ajv is the single authority for structural validation of schema-first
 * tool input.
 */

import type { SchemaObject } from 'ajv';

export type { SchemaObject };

/**
 * Validation error with JSON pointer path.
 */
export interface ValidationError {
  /** JSON pointer path to the error location (e.g., "/title") */
  path: string;
  /** Error message */
  message: string;
  /** Schema keyword that failed (e.g., "required", "type", "enum") */
  keyword: string;
  /** Additional parameters from the validation */
  params?: Record<string, unknown>;
}

/**
 * Result of structural validation via Ajv.
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** List of validation errors (empty if valid) */
  errors: ValidationError[];
}

/**
 * A compiled schema, ready to check documents.
 */
export type CompiledValidator = (data: unknown) => ValidationResult;

/**
 * Options for creating a validator instance.
 */
export interface ValidatorOptions {
  /** Whether to use Ajv strict mode (default: false; tool schemas often carry vendor keywords) */
  strict?: boolean;
  /** Whether to add standard formats (default: true) */
  addFormats?: boolean;
  /** Whether to allow union types (default: true) */
  allowUnionTypes?: boolean;
  /** Whether to coerce scalar types, e.g. "3" to 3 (default: false) */
  coerceTypes?: boolean;
}

/**
 * Summarise validation errors into one line.
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => (e.path === '/' ? e.message : `${e.path}: ${e.message}`)).join('; ');
}
