/**
 * AjvValidator: structural validation of schema-first tool input.
 *
 * Ajv is configured once at construction time (formats, options); schemas
 * are compiled lazily and cached per schema object, so a tool's schema is
 * compiled at most once for the lifetime of the validator.
 *
 * Supports JSON Schema Draft 2020-12, which is also what zod emits.
 */

import Ajv2020 from 'ajv/dist/2020.js';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type {
  CompiledValidator,
  ValidationError,
  ValidationResult,
  ValidatorOptions,
} from './types.js';

const DEFAULT_OPTIONS: Required<ValidatorOptions> = {
  strict: false,
  addFormats: true,
  allowUnionTypes: true,
  coerceTypes: false,
};

// Both packages are CommonJS; `.default` is the constructor/plugin under
// NodeNext type resolution and at run time.
type Ajv = InstanceType<typeof Ajv2020.default>;

/**
 * Convert an Ajv ErrorObject to our ValidationError format.
 */
function convertAjvError(error: ErrorObject): ValidationError {
  const path = error.instancePath || '/';
  const params: Record<string, unknown> = error.params;
  let message = error.message ?? 'Validation failed';

  switch (error.keyword) {
    case 'required':
      if ('missingProperty' in params) {
        message = `Missing required property: ${String(params['missingProperty'])}`;
      }
      break;
    case 'type':
      if ('type' in params) {
        message = `Expected type: ${String(params['type'])}`;
      }
      break;
    case 'enum':
      if (Array.isArray(params['allowedValues'])) {
        message = `Must be one of: ${params['allowedValues'].join(', ')}`;
      }
      break;
    case 'additionalProperties':
      if ('additionalProperty' in params) {
        message = `Unknown property: ${String(params['additionalProperty'])}`;
      }
      break;
    case 'minimum':
    case 'exclusiveMinimum':
      if ('limit' in params) {
        message = `Must be >= ${String(params['limit'])}`;
      }
      break;
    case 'maximum':
    case 'exclusiveMaximum':
      if ('limit' in params) {
        message = `Must be <= ${String(params['limit'])}`;
      }
      break;
    case 'format':
      if ('format' in params) {
        message = `Invalid format: expected ${String(params['format'])}`;
      }
      break;
  }

  return { path, message, keyword: error.keyword, params };
}

function toResult(validateFn: ValidateFunction, data: unknown): ValidationResult {
  if (validateFn(data)) {
    return { valid: true, errors: [] };
  }
  return { valid: false, errors: (validateFn.errors ?? []).map(convertAjvError) };
}

export class AjvValidator {
  private readonly ajv: Ajv;
  private readonly compiled = new WeakMap<object, ValidateFunction>();

  constructor(options: ValidatorOptions = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };

    this.ajv = new Ajv2020.default({
      strict: opts.strict,
      allowUnionTypes: opts.allowUnionTypes,
      coerceTypes: opts.coerceTypes,
      allErrors: true,
    });

    if (opts.addFormats) {
      addFormats.default(this.ajv);
    }
  }

  /**
   * Compile a schema and return a checker for it.
   *
   * Throws when the schema itself is invalid.
   */
  compile(schema: SchemaObject): CompiledValidator {
    const validateFn = this.getCompiled(schema);
    return (data) => toResult(validateFn, data);
  }

  /**
   * Validate data against an inline schema. Schema errors are reported
   * as a validation failure on the root path.
   */
  validateWithSchema(data: unknown, schema: SchemaObject): ValidationResult {
    try {
      return toResult(this.getCompiled(schema), data);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        valid: false,
        errors: [{ path: '/', message: `Schema error: ${message}`, keyword: 'schema' }],
      };
    }
  }

  /**
   * Check that a schema compiles; returns the compilation error message if not.
   */
  checkSchema(schema: SchemaObject): string | undefined {
    try {
      this.getCompiled(schema);
      return undefined;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }

  private getCompiled(schema: SchemaObject): ValidateFunction {
    const cached = this.compiled.get(schema);
    if (cached !== undefined) {
      return cached;
    }
    const validateFn = this.ajv.compile(schema);
    this.compiled.set(schema, validateFn);
    return validateFn;
  }
}

let sharedValidator: AjvValidator | undefined;

/**
 * The validator used by schema-first tools unless one is supplied.
 */
export function defaultValidator(): AjvValidator {
  sharedValidator ??= new AjvValidator();
  return sharedValidator;
}

/**
 * Create a new AjvValidator instance.
 */
export function createValidator(options?: ValidatorOptions): AjvValidator {
  return new AjvValidator(options);
}
