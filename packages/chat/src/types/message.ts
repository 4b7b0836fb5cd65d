import type { ToolCallRequest, ToolError, ToolResult } from './tool.js';

export type UserMessage = {
  readonly role: 'user';
  readonly content: string;
};

/**
 * A tool-call message has at least one entry in toolCalls; a final answer has none.
 */
export type AssistantMessage = {
  readonly role: 'assistant';
  readonly content: string;
  readonly toolCalls: ReadonlyArray<ToolCallRequest>;
};

export type ToolMessage = {
  readonly role: 'tool';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly content: string;
  readonly error: ToolError | null;
};

export type ChatMessage = UserMessage | AssistantMessage | ToolMessage;

export function createUserMessage(content: string): UserMessage {
  return Object.freeze({ role: 'user', content });
}

export function createAssistantMessage(
  content: string,
  toolCalls: ReadonlyArray<ToolCallRequest> = [],
): AssistantMessage {
  return Object.freeze({ role: 'assistant', content, toolCalls: Object.freeze([...toolCalls]) });
}

export function createToolMessage(result: Readonly<ToolResult>): ToolMessage {
  return Object.freeze({
    role: 'tool',
    toolCallId: result.toolCallId,
    toolName: result.toolName,
    content: result.output,
    error: result.error,
  });
}
