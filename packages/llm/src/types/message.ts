import type { ContentPart, Role } from './content.js';

export type Message = {
  readonly role: Role;
  readonly content: ReadonlyArray<ContentPart> | string;
};

export function userMessage(content: string | ReadonlyArray<ContentPart>): Message {
  return {
    role: 'user',
    content,
  };
}

export function assistantMessage(
  content: string | ReadonlyArray<ContentPart>,
): Message {
  return {
    role: 'assistant',
    content,
  };
}

export function toolMessage(
  toolCallId: string,
  toolName: string,
  content: string,
  isError?: boolean,
): Message {
  return {
    role: 'tool',
    content: [
      {
        kind: 'TOOL_RESULT',
        toolCallId,
        toolName,
        content,
        isError: isError ?? false,
      },
    ],
  };
}

/**
 * Normalizes message content to a part list; plain strings become a single TEXT part.
 */
export function messageParts(message: Readonly<Message>): ReadonlyArray<ContentPart> {
  if (typeof message.content === 'string') {
    return message.content.length > 0 ? [{ kind: 'TEXT', text: message.content }] : [];
  }
  return message.content;
}
