export type Role = 'user' | 'assistant' | 'tool';

export type ContentKind = 'TEXT' | 'TOOL_CALL' | 'TOOL_RESULT';

export type TextData = {
  readonly kind: 'TEXT';
  readonly text: string;
};

export type ToolCallData = {
  readonly kind: 'TOOL_CALL';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly args: Record<string, unknown>;
};

export type ToolResultData = {
  readonly kind: 'TOOL_RESULT';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly content: string;
  readonly isError: boolean;
};

export type ContentPart = TextData | ToolCallData | ToolResultData;
