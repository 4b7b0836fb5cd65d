export { createToolRegistry, toModelTools, type ToolTable } from './registry.js';
export { createBuiltinRegistry, BUILTIN_TOOLS } from './builtin.js';
export { validateArguments, type ValidationResult } from './validate.js';
export { executeToolCall, type ExecuteOptions } from './executor.js';
export { calculate, calculatorSchema, calculatorTool } from './calculator.js';
export { evaluateExpression, formatNumber } from './expression.js';
export { getCurrentWeather, weatherSchema, weatherTool, WEATHER_REPORT } from './weather.js';
