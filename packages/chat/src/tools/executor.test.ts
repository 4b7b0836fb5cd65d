import { describe, it, expect, vi } from 'vitest';
import { executeToolCall } from './executor.js';
import { createBuiltinRegistry } from './builtin.js';
import { createToolRegistry } from './registry.js';
import { calculatorSchema } from './calculator.js';
import { weatherTool, WEATHER_REPORT } from './weather.js';
import type { ApprovalHandler, ToolCallRequest } from '../types/index.js';

function call(toolName: string, args: Record<string, unknown>): ToolCallRequest {
  return { toolCallId: 'call-1', toolName, args };
}

describe('executeToolCall', () => {
  const registry = createBuiltinRegistry();

  it('runs the calculator and returns its output', async () => {
    const result = await executeToolCall(call('calculate', { expression: '12 * (3+4)' }), registry);

    expect(result).toEqual({ toolCallId: 'call-1', toolName: 'calculate', output: '84', error: null });
  });

  it('returns the constant weather report for any location', async () => {
    const paris = await executeToolCall(call('get_current_weather', { location: 'Paris' }), registry);
    const tokyo = await executeToolCall(call('get_current_weather', { location: 'Tokyo' }), registry);

    expect(paris.output).toBe(WEATHER_REPORT);
    expect(tokyo.output).toBe('The weather is 75°F and sunny.');
    expect(tokyo.error).toBeNull();
  });

  it('reports unknown tools with the list of available ones', async () => {
    const result = await executeToolCall(call('send_email', { to: 'someone' }), registry);

    expect(result).toEqual({
      toolCallId: 'call-1',
      toolName: 'send_email',
      output: 'Unknown tool: send_email. Available tools: calculate, get_current_weather',
      error: {
        kind: 'UnknownTool',
        message: 'Unknown tool: send_email. Available tools: calculate, get_current_weather',
      },
    });
  });

  it('does not resolve inherited object properties as tools', async () => {
    const result = await executeToolCall(call('toString', {}), registry);

    expect(result.error?.kind).toBe('UnknownTool');
  });

  it('reports missing arguments without running the tool', async () => {
    const result = await executeToolCall(call('calculate', {}), registry);

    expect(result.error).toEqual({
      kind: 'InvalidArguments',
      message: "Invalid arguments for calculate: missing required parameter 'expression'",
      parameter: 'expression',
    });
    expect(result.output).toBe("Invalid arguments for calculate: missing required parameter 'expression'");
  });

  it('keeps the InvalidExpression kind raised by the calculator', async () => {
    const result = await executeToolCall(call('calculate', { expression: '1 / 0' }), registry);

    expect(result.error).toEqual({
      kind: 'InvalidExpression',
      message: 'Invalid expression: division by zero',
      parameter: 'expression',
    });
  });

  it('rejects an empty location', async () => {
    const result = await executeToolCall(call('get_current_weather', { location: '  ' }), registry);

    expect(result.error).toEqual({
      kind: 'InvalidArguments',
      message: 'location must be a non-empty string',
      parameter: 'location',
    });
  });

  it('turns thrown errors into ExecutionFailed', async () => {
    const failing = createToolRegistry({
      calculate: {
        schema: calculatorSchema,
        run: () => {
          throw new Error('kaboom');
        },
      },
      get_current_weather: weatherTool,
    });

    const result = await executeToolCall(call('calculate', { expression: '1' }), failing);

    expect(result.error).toEqual({ kind: 'ExecutionFailed', message: 'Tool error in calculate: kaboom' });
    expect(result.output).toBe('Tool error in calculate: kaboom');
  });

  describe('approval', () => {
    it('asks before running a tool that requires approval', async () => {
      const approve = vi.fn<ApprovalHandler>().mockResolvedValue(true);
      const request = call('calculate', { expression: '2 + 2' });

      const result = await executeToolCall(request, registry, { approve });

      expect(result.output).toBe('4');
      expect(approve).toHaveBeenCalledWith(request, calculatorSchema);
    });

    it('reports a denial as ApprovalDenied', async () => {
      const approve = vi.fn<ApprovalHandler>().mockResolvedValue(false);

      const result = await executeToolCall(call('calculate', { expression: '2 + 2' }), registry, { approve });

      expect(result.error).toEqual({ kind: 'ApprovalDenied', message: 'Execution denied by user' });
      expect(result.output).toBe('Execution denied by user');
    });

    it('does not ask for tools that do not require approval', async () => {
      const approve = vi.fn<ApprovalHandler>().mockResolvedValue(false);

      const result = await executeToolCall(call('get_current_weather', { location: 'Oslo' }), registry, { approve });

      expect(result.output).toBe(WEATHER_REPORT);
      expect(approve).not.toHaveBeenCalled();
    });

    it('does not ask when the arguments are invalid', async () => {
      const approve = vi.fn<ApprovalHandler>().mockResolvedValue(true);

      await executeToolCall(call('calculate', {}), registry, { approve });

      expect(approve).not.toHaveBeenCalled();
    });

    it('reports a failing approval handler as ExecutionFailed', async () => {
      const approve = vi.fn<ApprovalHandler>().mockRejectedValue(new Error('prompt closed'));

      const result = await executeToolCall(call('calculate', { expression: '1' }), registry, { approve });

      expect(result.error).toEqual({ kind: 'ExecutionFailed', message: 'Tool error in calculate: prompt closed' });
    });
  });
});
