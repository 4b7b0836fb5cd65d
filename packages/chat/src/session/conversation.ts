import type { ChatMessage } from '../types/index.js';

/**
 * The ordered message list of one session. Append-only between resets.
 */
export type Conversation = {
  readonly append: (message: ChatMessage) => void;
  readonly messages: () => ReadonlyArray<ChatMessage>;
  readonly clear: () => void;
};

export function createConversation(): Conversation {
  let messages: ReadonlyArray<ChatMessage> = [];

  return {
    append(message: ChatMessage): void {
      messages = Object.freeze([...messages, Object.freeze(message)]);
    },
    messages(): ReadonlyArray<ChatMessage> {
      return messages;
    },
    clear(): void {
      messages = [];
    },
  };
}
