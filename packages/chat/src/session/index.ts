export { createChatSession, type ChatSession, type ChatSessionOptions } from './session.js';
export { runTurn, historyToMessages, DEFAULT_MAX_TOOL_ROUNDS, type TurnContext } from './loop.js';
export { classifyResponse, requestReply, type ModelReply } from './reply.js';
export { createConversation, type Conversation } from './conversation.js';
export { createSessionEventEmitter, type SessionEventEmitter } from './events.js';
