import type { ContentPart, LLMRequest, Message, ModelClient } from '@toolchat/llm';
import { assistantMessage, toolMessage, userMessage } from '@toolchat/llm';
import type {
  ApprovalHandler,
  ChatMessage,
  SessionConfig,
  ToolCallRequest,
  ToolRegistry,
} from '../types/index.js';
import {
  ToolLoopExceededError,
  UpstreamError,
  createAssistantMessage,
  createToolMessage,
  createUserMessage,
} from '../types/index.js';
import { executeToolCall } from '../tools/executor.js';
import { toModelTools } from '../tools/registry.js';
import type { Logger } from '../logging/logger.js';
import type { Conversation } from './conversation.js';
import type { SessionEventEmitter } from './events.js';
import { requestReply } from './reply.js';

export const DEFAULT_MAX_TOOL_ROUNDS = 10;

export type TurnContext = {
  readonly sessionId: string;
  readonly client: ModelClient;
  readonly config: SessionConfig;
  readonly registry: ToolRegistry;
  readonly conversation: Conversation;
  readonly eventEmitter: SessionEventEmitter;
  readonly logger: Logger;
  readonly approve?: ApprovalHandler;
};

/**
 * Drives one user turn to completion: model call, tool round trips, final answer.
 *
 * Resolves with the messages this turn appended. Rejects with UpstreamError when
 * a model call fails and ToolLoopExceededError when the model asks for a
 * maxToolRounds-th batch of tool calls; in both cases the messages already
 * appended stay in the conversation.
 */
export async function runTurn(context: TurnContext, input: string): Promise<ReadonlyArray<ChatMessage>> {
  const produced: ChatMessage[] = [];
  const append = (message: ChatMessage): void => {
    context.conversation.append(message);
    produced.push(message);
    context.eventEmitter.emit({ kind: 'MESSAGE_APPENDED', message });
  };

  append(createUserMessage(input));

  const tools = toModelTools(context.registry);
  let toolRounds = 0;

  while (true) {
    const request = buildRequest(context, tools);
    const reply = await requestReply(context.client, request);

    switch (reply.kind) {
      case 'TRANSPORT_ERROR':
        context.logger.warn('model call failed', { error: reply.error.message, toolRounds });
        throw new UpstreamError(reply.error, produced);

      case 'FINAL_TEXT':
        append(createAssistantMessage(reply.text));
        context.logger.debug('turn complete', { toolRounds, messages: produced.length });
        return produced;

      case 'TOOL_CALL_BATCH': {
        toolRounds++;
        if (toolRounds >= context.config.maxToolRounds) {
          context.logger.warn('tool loop limit reached', { maxToolRounds: context.config.maxToolRounds });
          throw new ToolLoopExceededError(context.config.maxToolRounds, produced);
        }

        append(createAssistantMessage(reply.text, reply.calls));
        for (const call of reply.calls) {
          await runToolCall(context, call, append);
        }
        break;
      }
    }
  }
}

async function runToolCall(
  context: TurnContext,
  call: ToolCallRequest,
  append: (message: ChatMessage) => void,
): Promise<void> {
  context.eventEmitter.emit({ kind: 'TOOL_CALL_START', call });
  context.logger.info('executing tool', { tool: call.toolName, toolCallId: call.toolCallId });

  const result = await executeToolCall(call, context.registry, context.approve ? { approve: context.approve } : {});
  if (result.error) {
    context.logger.warn('tool call failed', { tool: call.toolName, kind: result.error.kind, error: result.error.message });
  }

  append(createToolMessage(result));
  context.eventEmitter.emit({ kind: 'TOOL_CALL_END', result });
}

function buildRequest(context: TurnContext, tools: LLMRequest['tools']): LLMRequest {
  const { config } = context;
  return {
    model: config.model,
    system: config.systemInstruction,
    messages: historyToMessages(context.conversation.messages()),
    tools,
    temperature: config.temperature,
    ...(config.requestTimeoutMs !== null ? { timeout: { requestMs: config.requestTimeoutMs } } : {}),
  };
}

export function historyToMessages(history: ReadonlyArray<ChatMessage>): Array<Message> {
  return history.map((message) => {
    switch (message.role) {
      case 'user':
        return userMessage(message.content);
      case 'assistant': {
        if (message.toolCalls.length === 0) {
          return assistantMessage(message.content);
        }
        const parts: ContentPart[] = message.content.length > 0 ? [{ kind: 'TEXT', text: message.content }] : [];
        for (const call of message.toolCalls) {
          parts.push({ kind: 'TOOL_CALL', toolCallId: call.toolCallId, toolName: call.toolName, args: call.args });
        }
        return assistantMessage(parts);
      }
      case 'tool':
        return toolMessage(message.toolCallId, message.toolName, message.content, message.error !== null);
    }
  });
}
