// @toolchat/chat — tool-calling chat sessions on top of @toolchat/llm

export * from './types/index.js';
export * from './tools/index.js';
export * from './session/index.js';
export * from './history/index.js';
export * from './config/index.js';
export * from './logging/index.js';
