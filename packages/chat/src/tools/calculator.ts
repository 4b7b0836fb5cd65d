import type { RegisteredTool, ToolArgs, ToolSchema } from '../types/index.js';
import { ToolInputError } from '../types/index.js';
import { evaluateExpression } from './expression.js';

export const calculatorSchema: ToolSchema = {
  name: 'calculate',
  description: 'Performs a mathematical calculation and returns the result.',
  parameters: {
    expression: {
      type: 'string',
      description: 'The arithmetic expression to evaluate, for example "12 * (3 + 4)".',
      required: true,
    },
  },
  requiresApproval: true,
};

export function calculate(args: ToolArgs): string {
  const expression = args['expression'];
  if (typeof expression !== 'string') {
    throw new ToolInputError('InvalidArguments', 'expression must be a string', 'expression');
  }
  return evaluateExpression(expression);
}

export const calculatorTool: RegisteredTool = {
  schema: calculatorSchema,
  run: calculate,
};
