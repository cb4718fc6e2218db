/**
 * FunctionTool: a schema-first tool around an untyped handler.
 *
 * Useful when the input description already exists as JSON Schema, e.g. an
 * OpenAI-style function specification. Arguments are validated with Ajv and
 * handed to the handler as a plain object.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ToolError } from '../errors/ToolError.js';
import { isRecord, type JsonObject, type JsonValue, type SchemaDocument } from '../types/json.js';
import type { AjvValidator } from '../validation/AjvValidator.js';
import { formatZodIssues, jsonSchemaInput } from './codecs.js';
import type { InputCodec, Tool, ToolContext, ToolDescriptor } from './Tool.js';

export type FunctionHandler = (args: JsonObject, context: ToolContext) => Promise<JsonValue> | JsonValue;

/**
 * Optional descriptive fields settable on a FunctionTool.
 */
export type FunctionToolMetadata = Omit<ToolDescriptor, 'name' | 'description'>;

export interface FunctionToolOptions extends FunctionToolMetadata {
  /** Validator for the input schema (default: the shared one) */
  validator?: AjvValidator;
}

const functionSpecSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  parameters: z.record(z.string(), z.unknown()).default({ type: 'object', properties: {} }),
});

const wrappedSpecSchema = z
  .object({ type: z.literal('function'), function: functionSpecSchema })
  .transform((spec) => spec.function);

/** `{name, description, parameters}` or `{type: 'function', function: {...}}` */
const anyFunctionSpecSchema = z.union([wrappedSpecSchema, functionSpecSchema]);

export type FunctionSpec = z.input<typeof functionSpecSchema>;

function schemaInput(name: string, schema: SchemaDocument, validator: AjvValidator | undefined): InputCodec<JsonObject> {
  try {
    return jsonSchemaInput(schema, validator);
  } catch (err) {
    if (err instanceof ToolError) {
      throw ToolError.invalidParameters(name, err.detail, err.cause);
    }
    throw err;
  }
}

export class FunctionTool implements Tool<JsonObject, JsonValue> {
  readonly name: string;
  readonly description: string;
  readonly version?: string;
  readonly author?: string;
  readonly tags?: readonly string[];
  readonly enabled?: boolean;
  readonly extra?: Record<string, JsonValue>;
  readonly input: InputCodec<JsonObject>;

  private readonly handler: FunctionHandler;

  constructor(
    name: string,
    description: string,
    schema: SchemaDocument,
    handler: FunctionHandler,
    options: FunctionToolOptions = {},
  ) {
    const { validator, ...metadata } = options;
    this.name = name;
    this.description = description;
    if (metadata.version !== undefined) this.version = metadata.version;
    if (metadata.author !== undefined) this.author = metadata.author;
    if (metadata.tags !== undefined) this.tags = metadata.tags;
    if (metadata.enabled !== undefined) this.enabled = metadata.enabled;
    if (metadata.extra !== undefined) this.extra = metadata.extra;
    this.handler = handler;
    this.input = schemaInput(name, schema, validator);
  }

  async execute(input: JsonObject, context: ToolContext): Promise<JsonValue> {
    return this.handler(input, context);
  }

  static builder(name: string, description: string): FunctionToolBuilder {
    return new FunctionToolBuilder(name, description);
  }

  static fromSchema(
    name: string,
    description: string,
    schema: SchemaDocument,
    handler: FunctionHandler,
    options?: FunctionToolOptions,
  ): FunctionTool {
    return new FunctionTool(name, description, schema, handler, options);
  }

  /**
   * Create a tool from a function-calling specification.
   *
   * @throws ToolError (InvalidParameters) when the specification is malformed
   */
  static fromFunctionSpec(spec: unknown, handler: FunctionHandler, options?: FunctionToolOptions): FunctionTool {
    const parsed = anyFunctionSpecSchema.safeParse(spec);
    if (!parsed.success) {
      throw ToolError.invalidParameters(undefined, `invalid function spec: ${formatZodIssues(parsed.error)}`, parsed.error);
    }
    const { name, description, parameters } = parsed.data;
    return new FunctionTool(name, description, parameters, handler, options);
  }

  /**
   * Read a function-calling specification from a JSON or YAML file.
   */
  static async fromFunctionSpecFile(
    path: string,
    handler: FunctionHandler,
    options?: FunctionToolOptions,
  ): Promise<FunctionTool> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw ToolError.invalidParameters(undefined, `cannot read function spec '${path}': ${message}`, err);
    }

    let spec: unknown;
    try {
      // JSON is valid YAML, so one parser covers both formats.
      spec = parseYaml(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw ToolError.invalidParameters(undefined, `cannot parse function spec '${path}': ${message}`, err);
    }
    return FunctionTool.fromFunctionSpec(spec, handler, options);
  }
}

/**
 * Step-by-step construction of a FunctionTool.
 *
 * ```ts
 * const greet = FunctionTool.builder('greet', 'Greet someone')
 *   .property('name', { type: 'string' })
 *   .required('name')
 *   .handler(({ name }) => ({ greeting: `Hello, ${String(name)}` }))
 *   .build();
 * ```
 */
export class FunctionToolBuilder {
  private baseSchema: SchemaDocument | undefined;
  private readonly properties: Record<string, SchemaDocument> = {};
  private readonly requiredNames: string[] = [];
  private fields: FunctionToolMetadata = {};
  private validator: AjvValidator | undefined;
  private fn: FunctionHandler | undefined;

  constructor(
    private readonly name: string,
    private readonly description: string,
  ) {}

  /** Start from a complete schema; `property` and `required` add to it. */
  schema(schema: SchemaDocument): this {
    this.baseSchema = schema;
    return this;
  }

  property(name: string, schema: SchemaDocument): this {
    this.properties[name] = schema;
    return this;
  }

  required(name: string): this {
    if (!this.requiredNames.includes(name)) {
      this.requiredNames.push(name);
    }
    return this;
  }

  metadata(fields: FunctionToolMetadata): this {
    this.fields = { ...this.fields, ...fields };
    return this;
  }

  withValidator(validator: AjvValidator): this {
    this.validator = validator;
    return this;
  }

  handler(fn: FunctionHandler): this {
    this.fn = fn;
    return this;
  }

  /**
   * @throws ToolError (InvalidParameters) without a handler or with an invalid schema
   */
  build(): FunctionTool {
    if (this.fn === undefined) {
      throw ToolError.invalidParameters(this.name, 'no handler configured');
    }
    const options: FunctionToolOptions = { ...this.fields };
    if (this.validator !== undefined) {
      options.validator = this.validator;
    }
    return new FunctionTool(this.name, this.description, this.assembleSchema(), this.fn, options);
  }

  private assembleSchema(): SchemaDocument {
    const schema: SchemaDocument = { ...(this.baseSchema ?? { type: 'object' }) };

    if (Object.keys(this.properties).length > 0) {
      const existing = isRecord(schema['properties']) ? schema['properties'] : {};
      schema['properties'] = { ...existing, ...this.properties };
    } else if (this.baseSchema === undefined) {
      schema['properties'] = {};
    }

    if (this.requiredNames.length > 0) {
      const existing = Array.isArray(schema['required']) ? schema['required'] : [];
      schema['required'] = [...new Set([...existing, ...this.requiredNames])];
    }
    return schema;
  }
}
