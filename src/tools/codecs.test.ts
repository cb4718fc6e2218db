import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolError } from '../errors/ToolError.js';
import { jsonSchemaInput, zodInput } from './codecs.js';

function decodeError(fn: () => unknown): ToolError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ToolError) return err;
    throw err;
  }
  throw new Error('expected decode to throw');
}

describe('zodInput', () => {
  const codec = zodInput(z.object({ a: z.number(), b: z.number().default(1), label: z.string().optional() }));

  it('derives a JSON Schema from the zod type', () => {
    const schema = codec.schema();
    expect(schema['type']).toBe('object');
    expect(schema['properties']).toEqual({
      a: { type: 'number' },
      b: { type: 'number', default: 1 },
      label: { type: 'string' },
    });
    expect(schema['required']).toEqual(['a']);
  });

  it('decodes matching documents into the typed value', () => {
    expect(codec.decode({ a: 2 }, 'add')).toEqual({ a: 2, b: 1 });
  });

  it('rejects mismatching documents with InvalidParameters naming the path', () => {
    const error = decodeError(() => codec.decode({ a: 'two' }, 'add'));
    expect(error.kind).toBe('InvalidParameters');
    expect(error.toolName).toBe('add');
    expect(error.message).toMatch(/^Invalid parameters for tool 'add': a: /);
  });

  it('rejects non-objects', () => {
    expect(decodeError(() => codec.decode('nope', 'add')).kind).toBe('InvalidParameters');
  });
});

describe('jsonSchemaInput', () => {
  const schema = {
    type: 'object',
    properties: { q: { type: 'string', minLength: 1 } },
    required: ['q'],
  };

  it('advertises the given schema', () => {
    expect(jsonSchemaInput(schema).schema()).toBe(schema);
  });

  it('passes valid documents through', () => {
    expect(jsonSchemaInput(schema).decode({ q: 'cats' }, 'search')).toEqual({ q: 'cats' });
  });

  it('rejects invalid documents with the validator messages', () => {
    const error = decodeError(() => jsonSchemaInput(schema).decode({}, 'search'));
    expect(error.message).toBe("Invalid parameters for tool 'search': Missing required property: q");
  });

  it('requires an object document', () => {
    const error = decodeError(() => jsonSchemaInput(schema).decode([1], 'search'));
    expect(error.message).toBe("Invalid parameters for tool 'search': arguments must be an object");
  });

  it('fails fast on a schema that does not compile', () => {
    const error = decodeError(() => jsonSchemaInput({ type: 'object', required: 'q' }));
    expect(error.kind).toBe('InvalidParameters');
    expect(error.detail).toMatch(/^invalid input schema: /);
  });
});
