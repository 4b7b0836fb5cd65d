import type { ChatMessage } from './message.js';

export class ChatError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

/**
 * The model call failed. The turn is over; nothing from the failed call was recorded.
 */
export class UpstreamError extends ChatError {
  readonly messages: ReadonlyArray<ChatMessage>;

  constructor(cause: Error, messages: ReadonlyArray<ChatMessage>) {
    super(`Model request failed: ${cause.message}`, cause);
    this.messages = messages;
  }
}

/**
 * The model kept asking for tools. Every message appended before the guard tripped is kept.
 */
export class ToolLoopExceededError extends ChatError {
  readonly maxToolRounds: number;
  readonly messages: ReadonlyArray<ChatMessage>;

  constructor(maxToolRounds: number, messages: ReadonlyArray<ChatMessage>) {
    super(`Tool loop limit reached: the model requested ${maxToolRounds} rounds of tool calls in one turn`);
    this.maxToolRounds = maxToolRounds;
    this.messages = messages;
  }
}

export class SessionBusyError extends ChatError {
  constructor() {
    super('A turn is already in progress for this session');
  }
}

/**
 * Thrown by tool functions for bad input; the executor keeps the kind instead of
 * reporting ExecutionFailed.
 */
export class ToolInputError extends ChatError {
  readonly kind: 'InvalidArguments' | 'InvalidExpression';
  readonly parameter?: string;

  constructor(kind: 'InvalidArguments' | 'InvalidExpression', message: string, parameter?: string) {
    super(message);
    this.kind = kind;
    this.parameter = parameter;
  }
}
