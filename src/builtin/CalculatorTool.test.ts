import { describe, it, expect, beforeEach } from 'vitest';
import { ToolExecutor } from '../executor/ToolExecutor.js';
import { ToolRegistry } from '../registry/ToolRegistry.js';
import { registerBuiltinTools } from './index.js';

describe('calculator', () => {
  let executor: ToolExecutor;

  beforeEach(() => {
    const registry = new ToolRegistry();
    registerBuiltinTools(registry);
    executor = new ToolExecutor(registry);
  });

  it.each([
    [{ operation: 'add', a: 2, b: 3 }, 5, '2 add 3'],
    [{ operation: 'subtract', a: 10, b: 4 }, 6, '10 subtract 4'],
    [{ operation: 'multiply', a: 6, b: 7 }, 42, '6 multiply 7'],
    [{ operation: 'divide', a: 9, b: 2 }, 4.5, '9 divide 2'],
    [{ operation: 'power', a: 2, b: 10 }, 1024, '2 power 10'],
    [{ operation: 'sqrt', a: 16 }, 4, 'sqrt(16)'],
    [{ operation: 'abs', a: -3.5 }, 3.5, 'abs(-3.5)'],
  ])('computes %j', async (input, result, expression) => {
    await expect(executor.executeSimple('calculator', input)).resolves.toEqual({
      result,
      expression,
      operation: input.operation,
    });
  });

  it('registers with its metadata', () => {
    const registry = new ToolRegistry();
    const [metadata] = registerBuiltinTools(registry);

    expect(metadata).toMatchObject({
      name: 'calculator',
      version: '2.0.0',
      tags: ['math', 'calculator', 'arithmetic'],
      enabled: true,
    });
    expect(metadata?.inputSchema).toMatchObject({
      type: 'object',
      properties: {
        operation: { type: 'string', enum: ['add', 'subtract', 'multiply', 'divide', 'power', 'sqrt', 'abs'] },
        a: { type: 'number' },
        b: { type: 'number' },
      },
      required: ['operation', 'a'],
      additionalProperties: false,
    });
  });

  it('requires b for binary operations', async () => {
    await expect(executor.execute('calculator', { operation: 'add', a: 1 })).resolves.toMatchObject({
      success: false,
      errorKind: 'InvalidParameters',
      error: "Invalid parameters for tool 'calculator': Operation 'add' requires operand 'b'",
      attempts: 0,
    });
  });

  it('rejects unknown operations and stray fields', async () => {
    await expect(executor.execute('calculator', { operation: 'modulo', a: 1, b: 2 })).resolves.toMatchObject({
      errorKind: 'InvalidParameters',
    });
    await expect(executor.execute('calculator', { operation: 'abs', a: 1, c: 2 })).resolves.toMatchObject({
      errorKind: 'InvalidParameters',
    });
  });

  it('refuses to divide by zero', async () => {
    await expect(executor.execute('calculator', { operation: 'divide', a: 1, b: 0 })).resolves.toMatchObject({
      success: false,
      errorKind: 'ExecutionFailed',
      error: "Tool 'calculator' execution failed: Division by zero",
    });
  });

  it('refuses the square root of a negative number', async () => {
    await expect(executor.executeSimple('calculator', { operation: 'sqrt', a: -4 })).rejects.toMatchObject({
      kind: 'ExecutionFailed',
      operation: 'sqrt',
      detail: 'Cannot calculate square root of negative number',
    });
  });

  it('refuses results that are not finite', async () => {
    await expect(executor.execute('calculator', { operation: 'power', a: 10, b: 400 })).resolves.toMatchObject({
      error: "Tool 'calculator' execution failed: Result is not a finite number",
    });
  });
});
