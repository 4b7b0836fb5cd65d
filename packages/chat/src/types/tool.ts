export const TOOL_NAMES = ['calculate', 'get_current_weather'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean';

export type ParameterValue = string | number | boolean;

export type ParameterSpec = {
  readonly type: ParameterType;
  readonly description: string;
  readonly required: boolean;
};

export type ToolSchema = {
  readonly name: ToolName;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
  /** The host asks the user before running the tool when an approval handler is configured. */
  readonly requiresApproval?: boolean;
};

/** Arguments after validation against the tool's parameter spec. */
export type ToolArgs = Readonly<Record<string, ParameterValue>>;

export type ToolFunction = (args: ToolArgs) => Promise<string> | string;

export type RegisteredTool = {
  readonly schema: ToolSchema;
  readonly run: ToolFunction;
};

export type ToolCallRequest = {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly args: Record<string, unknown>;
};

export type ToolErrorKind =
  | 'UnknownTool'
  | 'InvalidArguments'
  | 'ExecutionFailed'
  | 'InvalidExpression'
  | 'ApprovalDenied';

export type ToolError = {
  readonly kind: ToolErrorKind;
  readonly message: string;
  readonly parameter?: string;
};

export type ToolResult = {
  readonly toolCallId: string;
  readonly toolName: string;
  /** Text handed back to the model: the tool's output, or the error message. */
  readonly output: string;
  readonly error: ToolError | null;
};

export type ApprovalHandler = (
  call: Readonly<ToolCallRequest>,
  schema: Readonly<ToolSchema>,
) => Promise<boolean>;

/**
 * Fixed for the lifetime of the process: there is no register/unregister.
 */
export type ToolRegistry = {
  readonly listSchemas: () => ReadonlyArray<ToolSchema>;
  readonly resolve: (name: string) => RegisteredTool | null;
};
