import type { ToolRegistry } from '../types/index.js';
import { calculatorTool } from './calculator.js';
import { weatherTool } from './weather.js';
import { createToolRegistry, type ToolTable } from './registry.js';

export const BUILTIN_TOOLS: ToolTable = {
  calculate: calculatorTool,
  get_current_weather: weatherTool,
};

export function createBuiltinRegistry(): ToolRegistry {
  return createToolRegistry(BUILTIN_TOOLS);
}
