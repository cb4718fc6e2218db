/**
 * Tests for AjvValidator module.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AjvValidator, createValidator, defaultValidator } from './AjvValidator.js';
import { formatValidationErrors } from './types.js';

describe('AjvValidator', () => {
  let validator: AjvValidator;

  beforeEach(() => {
    validator = createValidator();
  });

  describe('compile', () => {
    const schema = {
      type: 'object',
      required: ['title', 'kind'],
      properties: {
        kind: { type: 'string', enum: ['note', 'task'] },
        title: { type: 'string', minLength: 1 },
        count: { type: 'integer', minimum: 0 },
        contact: { type: 'string', format: 'email' },
      },
      additionalProperties: false,
    };

    it('validates conforming data', () => {
      const check = validator.compile(schema);
      const result = check({ kind: 'note', title: 'Hello World' });

      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it('reports a missing required property', () => {
      const result = validator.compile(schema)({ kind: 'note' });

      expect(result.valid).toBe(false);
      expect(result.errors).toContainEqual(
        expect.objectContaining({ path: '/', keyword: 'required', message: 'Missing required property: title' }),
      );
    });

    it('reports a wrong type with its path', () => {
      const result = validator.compile(schema)({ kind: 'note', title: 123 });

      expect(result.valid).toBe(false);
      expect(result.errors).toContainEqual(
        expect.objectContaining({ path: '/title', keyword: 'type', message: 'Expected type: string' }),
      );
    });

    it('reports enum violations', () => {
      const result = validator.compile(schema)({ kind: 'memo', title: 'x' });

      expect(result.errors).toContainEqual(
        expect.objectContaining({ path: '/kind', message: 'Must be one of: note, task' }),
      );
    });

    it('reports unknown properties', () => {
      const result = validator.compile(schema)({ kind: 'note', title: 'x', extra: true });

      expect(result.errors).toContainEqual(expect.objectContaining({ message: 'Unknown property: extra' }));
    });

    it('reports minimum violations', () => {
      const result = validator.compile(schema)({ kind: 'note', title: 'x', count: -1 });

      expect(result.errors).toContainEqual(expect.objectContaining({ path: '/count', message: 'Must be >= 0' }));
    });

    it('checks formats', () => {
      const result = validator.compile(schema)({ kind: 'note', title: 'x', contact: 'not-an-email' });

      expect(result.errors).toContainEqual(
        expect.objectContaining({ path: '/contact', message: 'Invalid format: expected email' }),
      );
    });

    it('collects every error, not just the first', () => {
      const result = validator.compile(schema)({ kind: 'memo', count: 1.5 });

      expect(result.errors.length).toBeGreaterThanOrEqual(3);
    });

    it('throws for a schema that does not compile', () => {
      expect(() => validator.compile({ type: 'not-a-type' })).toThrow();
    });
  });

  describe('validateWithSchema', () => {
    it('reports schema errors as a root failure', () => {
      const result = validator.validateWithSchema({}, { type: 'not-a-type' });

      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.keyword).toBe('schema');
      expect(result.errors[0]?.message).toMatch(/^Schema error: /);
    });

    it('validates inline schemas', () => {
      expect(validator.validateWithSchema(3, { type: 'number' }).valid).toBe(true);
      expect(validator.validateWithSchema('3', { type: 'number' }).valid).toBe(false);
    });
  });

  describe('checkSchema', () => {
    it('returns undefined for a valid schema', () => {
      expect(validator.checkSchema({ type: 'object', properties: {} })).toBeUndefined();
    });

    it('returns the compilation message for an invalid schema', () => {
      expect(validator.checkSchema({ type: 'object', required: 'name' })).toEqual(expect.any(String));
    });
  });

  describe('options', () => {
    it('coerces scalar types when asked', () => {
      const coercing = createValidator({ coerceTypes: true });
      expect(coercing.validateWithSchema({ n: '3' }, { type: 'object', properties: { n: { type: 'number' } } }).valid).toBe(
        true,
      );
    });

    it('can skip format validation', () => {
      const plain = createValidator({ addFormats: false });
      expect(plain.validateWithSchema('x', { type: 'string', format: 'email' }).valid).toBe(true);
    });
  });

  it('defaultValidator returns a shared instance', () => {
    expect(defaultValidator()).toBe(defaultValidator());
  });
});

describe('formatValidationErrors', () => {
  it('joins errors and omits the root path', () => {
    expect(
      formatValidationErrors([
        { path: '/', message: 'Missing required property: a', keyword: 'required' },
        { path: '/b', message: 'Expected type: number', keyword: 'type' },
      ]),
    ).toBe('Missing required property: a; /b: Expected type: number');
  });
});
