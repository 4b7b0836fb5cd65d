import type { Message } from './message.js';
import type { Tool } from './tool.js';
import type { TimeoutConfig } from './config.js';

export type LLMRequest = {
  readonly model: string;
  readonly messages: ReadonlyArray<Message>;
  readonly system?: string;
  readonly tools?: ReadonlyArray<Tool>;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly timeout?: TimeoutConfig;
};
