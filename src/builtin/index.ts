/**
 * Built-in tools.
 */

import type { ToolRegistry } from '../registry/ToolRegistry.js';
import type { ToolMetadata } from '../tools/ToolMetadata.js';
import { createCalculatorTool } from './CalculatorTool.js';

export {
  createCalculatorTool,
  calculatorInput,
  calculatorOutput,
  CALCULATOR_OPERATIONS,
} from './CalculatorTool.js';
export type { CalculatorInput, CalculatorOutput, CalculatorOperation } from './CalculatorTool.js';

/**
 * Register every built-in tool.
 *
 * @throws ToolError AlreadyExists when one of them is registered already
 */
export function registerBuiltinTools(registry: ToolRegistry): ToolMetadata[] {
  return [registry.register(createCalculatorTool())];
}
