import { z } from 'zod';
import { errorContext } from '../errors/ToolError.js';
import { defineTool } from '../tools/defineTool.js';
import type { Tool } from '../tools/Tool.js';

export const CALCULATOR_OPERATIONS = ['add', 'subtract', 'multiply', 'divide', 'power', 'sqrt', 'abs'] as const;

export type CalculatorOperation = (typeof CALCULATOR_OPERATIONS)[number];

const UNARY: ReadonlySet<CalculatorOperation> = new Set<CalculatorOperation>(['sqrt', 'abs']);

export const calculatorInput = z.strictObject({
  operation: z.enum(CALCULATOR_OPERATIONS).describe('Mathematical operation to perform'),
  a: z.number().describe('First operand'),
  b: z.number().optional().describe('Second operand (not used for sqrt and abs)'),
});

export const calculatorOutput = z.object({
  result: z.number(),
  expression: z.string(),
  operation: z.enum(CALCULATOR_OPERATIONS),
});

export type CalculatorInput = z.output<typeof calculatorInput>;
export type CalculatorOutput = z.output<typeof calculatorOutput>;

function calculate(operation: CalculatorOperation, a: number, b: number): number {
  switch (operation) {
    case 'add':
      return a + b;
    case 'subtract':
      return a - b;
    case 'multiply':
      return a * b;
    case 'divide':
      if (b === 0) {
        throw errorContext().withTool('calculator').withOperation(operation).executionFailed('Division by zero');
      }
      return a / b;
    case 'power':
      return Math.pow(a, b);
    case 'sqrt':
      if (a < 0) {
        throw errorContext()
          .withTool('calculator')
          .withOperation(operation)
          .executionFailed('Cannot calculate square root of negative number');
      }
      return Math.sqrt(a);
    case 'abs':
      return Math.abs(a);
  }
}

export function createCalculatorTool(): Tool<CalculatorInput, CalculatorOutput> {
  return defineTool({
    name: 'calculator',
    description: 'Perform mathematical operations including basic arithmetic, power, square root, and absolute value',
    version: '2.0.0',
    tags: ['math', 'calculator', 'arithmetic'],
    input: calculatorInput,
    output: calculatorOutput,
    validate({ operation, b }) {
      if (!UNARY.has(operation) && b === undefined) {
        throw errorContext().withTool('calculator').invalidParameters(`Operation '${operation}' requires operand 'b'`);
      }
    },
    execute({ operation, a, b }): CalculatorOutput {
      const operand = b ?? 0;
      const result = calculate(operation, a, operand);
      if (!Number.isFinite(result)) {
        throw errorContext().withTool('calculator').withOperation(operation).executionFailed('Result is not a finite number');
      }
      const expression = UNARY.has(operation) ? `${operation}(${a})` : `${a} ${operation} ${operand}`;
      return { result, expression, operation };
    },
  });
}
