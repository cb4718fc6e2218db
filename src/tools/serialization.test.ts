import { describe, it, expect } from 'vitest';
import { SerializationError, isJsonObject, isJsonValue, toStructuredValue } from './serialization.js';

describe('toStructuredValue', () => {
  it('keeps documents as they are', () => {
    const value = { a: 1, b: [true, null, 'x'], c: { d: -2.5 } };
    expect(toStructuredValue(value)).toEqual(value);
  });

  it('turns Dates into ISO strings', () => {
    expect(toStructuredValue({ at: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) })).toEqual({
      at: '2024-01-02T03:04:05.000Z',
    });
  });

  it('drops undefined properties', () => {
    expect(toStructuredValue({ a: 1, b: undefined })).toEqual({ a: 1 });
  });

  it('maps a top-level undefined to null', () => {
    expect(toStructuredValue(undefined)).toBeNull();
  });

  it('rejects undefined array items', () => {
    expect(() => toStructuredValue([1, undefined])).toThrow("undefined value at '/1'");
  });

  it('rejects non-finite numbers with their path', () => {
    expect(() => toStructuredValue({ n: { m: Number.NaN } })).toThrow("non-finite number NaN at '/n/m'");
    expect(() => toStructuredValue(Infinity)).toThrow('non-finite number Infinity');
  });

  it('rejects functions, symbols and bigints', () => {
    expect(() => toStructuredValue({ f: () => 1 })).toThrow(SerializationError);
    expect(() => toStructuredValue(Symbol('s'))).toThrow('unsupported symbol value');
    expect(() => toStructuredValue(10n)).toThrow('unsupported bigint value');
  });

  it('rejects class instances', () => {
    expect(() => toStructuredValue(new Map())).toThrow('unsupported object [object Map]');
  });

  it('rejects cycles', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;
    expect(() => toStructuredValue(cyclic)).toThrow("circular reference at '/self'");
  });

  it('allows the same object twice when it is not a cycle', () => {
    const shared = { x: 1 };
    expect(toStructuredValue({ a: shared, b: shared })).toEqual({ a: { x: 1 }, b: { x: 1 } });
  });

  it('accepts null-prototype objects', () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare['k'] = 'v';
    expect(toStructuredValue(bare)).toEqual({ k: 'v' });
  });
});

describe('isJsonValue / isJsonObject', () => {
  it('recognises documents', () => {
    expect(isJsonValue({ a: [1, 'b', null] })).toBe(true);
    expect(isJsonObject({ a: 1 })).toBe(true);
  });

  it('rejects arrays as objects and non-JSON values', () => {
    expect(isJsonObject([1])).toBe(false);
    expect(isJsonValue({ a: undefined })).toBe(false);
    expect(isJsonValue(new Date())).toBe(false);
    expect(isJsonValue(Number.POSITIVE_INFINITY)).toBe(false);
  });
});
