import type { ChatMessage, ToolCallRequest, ToolResult } from '../types/index.js';
import { ToolLoopExceededError, UpstreamError } from '../types/index.js';

export const COLORS = {
  user: '\x1b[94m',
  assistant: '\x1b[92m',
  dim: '\x1b[2m',
  error: '\x1b[91m',
  reset: '\x1b[0m',
} as const;

export function userPrompt(): string {
  return `${COLORS.user}You: ${COLORS.reset}`;
}

export function formatAssistantReply(text: string): string {
  return `${COLORS.assistant}Gemini: ${COLORS.reset}${text}`;
}

/** The final answer of a completed turn, or null when the turn produced none. */
export function finalReply(messages: ReadonlyArray<ChatMessage>): string | null {
  const last = messages[messages.length - 1];
  return last?.role === 'assistant' && last.toolCalls.length === 0 ? last.content : null;
}

export function formatToolCall(call: Readonly<ToolCallRequest>): string {
  return `${call.toolName}(${JSON.stringify(call.args)})`;
}

export function formatToolActivity(result: Readonly<ToolResult>): string {
  const outcome = result.error ? `${result.error.kind}: ${result.output}` : result.output;
  return `${COLORS.dim}  [tool] ${result.toolName} -> ${outcome}${COLORS.reset}`;
}

export function formatTurnError(error: unknown): string {
  if (error instanceof ToolLoopExceededError) {
    return `${COLORS.error}The model kept calling tools without answering (limit ${error.maxToolRounds}). Please try again.${COLORS.reset}`;
  }
  if (error instanceof UpstreamError) {
    return `${COLORS.error}${error.message}. Please try again.${COLORS.reset}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `${COLORS.error}Error: ${message}${COLORS.reset}`;
}

/** Accepts y/yes in any case; everything else is a denial. */
export function isApproval(answer: string): boolean {
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}
