import type { ChatMessage } from './message.js';
import type { ToolCallRequest, ToolResult } from './tool.js';

export type EventKind =
  | 'TURN_START'
  | 'MESSAGE_APPENDED'
  | 'TOOL_CALL_START'
  | 'TOOL_CALL_END'
  | 'TURN_END'
  | 'ERROR';

export type SessionEvent =
  | { readonly kind: 'TURN_START'; readonly sessionId: string; readonly input: string }
  | { readonly kind: 'MESSAGE_APPENDED'; readonly message: ChatMessage }
  | { readonly kind: 'TOOL_CALL_START'; readonly call: ToolCallRequest }
  | { readonly kind: 'TOOL_CALL_END'; readonly result: ToolResult }
  | { readonly kind: 'TURN_END'; readonly messages: ReadonlyArray<ChatMessage> }
  | { readonly kind: 'ERROR'; readonly error: Error };

export type SessionEventListener = (event: SessionEvent) => void;
