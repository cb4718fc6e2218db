import type { z } from 'zod';
import { zodInput } from './codecs.js';
import type { Tool, ToolContext, ToolDescriptor } from './Tool.js';

export interface ZodToolDefinition<S extends z.ZodType, O> extends ToolDescriptor {
  input: S;
  output?: z.ZodType<O>;
  validate?(input: z.output<S>): void;
  execute(input: z.output<S>, context: ToolContext): Promise<O> | O;
}

/**
 * Define a tool typed by its zod input (and optionally output) schema.
 *
 * ```ts
 * const add = defineTool({
 *   name: 'add',
 *   description: 'Add two numbers',
 *   input: z.object({ a: z.number(), b: z.number() }),
 *   execute: ({ a, b }) => ({ result: a + b }),
 * });
 * ```
 */
export function defineTool<S extends z.ZodType, O>(definition: ZodToolDefinition<S, O>): Tool<z.output<S>, O> {
  const { input, output, validate, execute, ...descriptor } = definition;
  return {
    ...descriptor,
    input: zodInput(input),
    ...(output !== undefined ? { output } : {}),
    ...(validate !== undefined ? { validate } : {}),
    execute: async (value, context) => execute(value, context),
  };
}
