import { nanoid } from 'nanoid';
import type { ModelClient } from '@toolchat/llm';
import type {
  ApprovalHandler,
  ChatMessage,
  SessionConfig,
  SessionEventListener,
  SessionState,
  ToolRegistry,
} from '../types/index.js';
import { SessionBusyError, ToolLoopExceededError, UpstreamError } from '../types/index.js';
import { createBuiltinRegistry } from '../tools/builtin.js';
import { createHistoryWriter, type HistoryWriter } from '../history/history-writer.js';
import { errorFields, noopLogger, type Logger } from '../logging/logger.js';
import { createConversation } from './conversation.js';
import { createSessionEventEmitter } from './events.js';
import { runTurn, type TurnContext } from './loop.js';

export type ChatSessionOptions = {
  readonly client: ModelClient;
  readonly config: SessionConfig;
  readonly registry?: ToolRegistry;
  readonly approve?: ApprovalHandler;
  readonly logger?: Logger;
  /** Clock for history file names. */
  readonly now?: () => Date;
};

export type ChatSession = {
  readonly id: string;
  readonly submit: (input: string) => Promise<ReadonlyArray<ChatMessage>>;
  readonly messages: () => ReadonlyArray<ChatMessage>;
  readonly state: () => SessionState;
  readonly subscribe: (listener: SessionEventListener) => () => void;
  /** Clears the conversation; with history enabled, later turns go to a new file. */
  readonly reset: () => void;
  /** The history file of the current conversation; null until its first save. */
  readonly historyPath: () => string | null;
};

export function createChatSession(options: ChatSessionOptions): ChatSession {
  const sessionId = nanoid();
  const { config } = options;
  const now = options.now ?? (() => new Date());
  const logger = (options.logger ?? noopLogger).child({ sessionId });
  const registry = options.registry ?? createBuiltinRegistry();
  const conversation = createConversation();
  const eventEmitter = createSessionEventEmitter();
  let currentState: SessionState = 'IDLE';

  const openHistory = (): HistoryWriter | null =>
    config.saveHistory ? createHistoryWriter({ directory: config.historyDir, startedAt: now() }) : null;
  let history = openHistory();

  const context: TurnContext = {
    sessionId,
    client: options.client,
    config,
    registry,
    conversation,
    eventEmitter,
    logger,
    ...(options.approve ? { approve: options.approve } : {}),
  };

  const persist = async (): Promise<void> => {
    if (!history) {
      return;
    }
    try {
      await history.save(conversation.messages());
    } catch (err) {
      logger.error('failed to save chat history', { path: history.path(), ...errorFields(err) });
    }
  };

  const submit = async (input: string): Promise<ReadonlyArray<ChatMessage>> => {
    if (currentState === 'PROCESSING') {
      throw new SessionBusyError();
    }

    currentState = 'PROCESSING';

    try {
      eventEmitter.emit({ kind: 'TURN_START', sessionId, input });
      logger.debug('turn started', { inputLength: input.length });
      const messages = await runTurn(context, input);
      eventEmitter.emit({ kind: 'TURN_END', messages });
      return messages;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (!(error instanceof UpstreamError || error instanceof ToolLoopExceededError)) {
        logger.error('turn failed', errorFields(error));
      }
      eventEmitter.emit({ kind: 'ERROR', error });
      throw error;
    } finally {
      await persist();
      currentState = 'IDLE';
    }
  };

  const reset = (): void => {
    if (currentState === 'PROCESSING') {
      throw new SessionBusyError();
    }
    conversation.clear();
    history = openHistory();
    logger.info('session reset');
  };

  return {
    id: sessionId,
    submit,
    messages: () => conversation.messages(),
    state: () => currentState,
    subscribe: (listener) => eventEmitter.subscribe(listener),
    reset,
    historyPath: () => history?.path() ?? null,
  };
}
