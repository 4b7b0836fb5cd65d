import type { ApprovalHandler, ToolCallRequest, ToolError, ToolRegistry, ToolResult } from '../types/index.js';
import { ToolInputError } from '../types/index.js';
import { validateArguments } from './validate.js';

export type ExecuteOptions = {
  readonly approve?: ApprovalHandler;
};

function failed(call: Readonly<ToolCallRequest>, error: ToolError): ToolResult {
  return {
    toolCallId: call.toolCallId,
    toolName: call.toolName,
    output: error.message,
    error,
  };
}

/**
 * Runs one model-requested tool call. Every failure is reported in the result,
 * so the returned promise never rejects.
 */
export async function executeToolCall(
  call: Readonly<ToolCallRequest>,
  registry: ToolRegistry,
  options: ExecuteOptions = {},
): Promise<ToolResult> {
  const tool = registry.resolve(call.toolName);
  if (!tool) {
    const available = registry.listSchemas().map((schema) => schema.name).join(', ');
    return failed(call, {
      kind: 'UnknownTool',
      message: `Unknown tool: ${call.toolName}. Available tools: ${available}`,
    });
  }

  const validation = validateArguments(tool.schema, call.args);
  if (!validation.ok) {
    return failed(call, validation.error);
  }

  try {
    if (tool.schema.requiresApproval && options.approve) {
      const approved = await options.approve(call, tool.schema);
      if (!approved) {
        return failed(call, { kind: 'ApprovalDenied', message: 'Execution denied by user' });
      }
    }

    const output = await tool.run(validation.args);
    return {
      toolCallId: call.toolCallId,
      toolName: call.toolName,
      output,
      error: null,
    };
  } catch (error) {
    if (error instanceof ToolInputError) {
      return failed(call, {
        kind: error.kind,
        message: error.message,
        ...(error.parameter !== undefined ? { parameter: error.parameter } : {}),
      });
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    return failed(call, {
      kind: 'ExecutionFailed',
      message: `Tool error in ${call.toolName}: ${errorMessage}`,
    });
  }
}
