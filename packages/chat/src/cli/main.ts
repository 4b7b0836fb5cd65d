#!/usr/bin/env node
import * as readline from 'node:readline';
import { config as dotenvConfig } from 'dotenv';
import { Client, GeminiAdapter } from '@toolchat/llm';
import { loadConfig } from '../config/config.js';
import { ConsoleLogger, createLoggingMiddleware } from '../logging/index.js';
import { createChatSession } from '../session/session.js';
import type { ApprovalHandler } from '../types/index.js';
import {
  COLORS,
  finalReply,
  formatAssistantReply,
  formatToolActivity,
  formatToolCall,
  formatTurnError,
  isApproval,
  userPrompt,
} from './format.js';

type Prompter = (question: string) => Promise<string | null>;

/** Resolves null once input has ended (Ctrl-D or a closed pipe). */
function createPrompter(rl: readline.Interface): Prompter {
  let closed = false;
  const pending = new Set<(answer: string | null) => void>();

  rl.on('close', () => {
    closed = true;
    for (const resolve of pending) {
      resolve(null);
    }
    pending.clear();
  });

  return (question) => {
    if (closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      pending.add(resolve);
      rl.question(question, (answer) => {
        pending.delete(resolve);
        resolve(answer);
      });
    });
  };
}

function printBanner(model: string): void {
  console.log(`toolchat: chatting with ${model}`);
  console.log(`${COLORS.dim}Type 'exit' to quit, '/reset' to start a new conversation.${COLORS.reset}`);
  console.log();
}

async function main(): Promise<void> {
  dotenvConfig();
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel, { component: 'toolchat' });

  const client = new Client({
    provider: new GeminiAdapter(config.apiKey),
    middleware: [createLoggingMiddleware(logger.child({ component: 'model' }))],
  });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const ask = createPrompter(rl);

  const approve: ApprovalHandler = async (call) => {
    const answer = await ask(`${COLORS.dim}Allow ${formatToolCall(call)}? (yes/no): ${COLORS.reset}`);
    return answer !== null && isApproval(answer);
  };

  const session = createChatSession({
    client,
    config,
    logger,
    ...(config.autoApprove ? {} : { approve }),
  });

  session.subscribe((event) => {
    if (event.kind === 'TOOL_CALL_END') {
      console.log(formatToolActivity(event.result));
    }
  });

  printBanner(config.model);

  for (;;) {
    const line = await ask(userPrompt());
    if (line === null) {
      break;
    }

    const input = line.trim();
    if (input.toLowerCase() === 'exit') {
      break;
    }
    if (input === '/reset') {
      session.reset();
      console.log(`${COLORS.dim}Conversation cleared.${COLORS.reset}`);
      continue;
    }
    if (input.length === 0) {
      continue;
    }

    try {
      const messages = await session.submit(input);
      console.log(formatAssistantReply(finalReply(messages) ?? ''));
    } catch (err) {
      console.log(formatTurnError(err));
    }
  }

  rl.close();

  const historyPath = session.historyPath();
  if (historyPath !== null && session.messages().length > 0) {
    console.log(`${COLORS.dim}Chat history saved to ${historyPath}${COLORS.reset}`);
  }
}

main().catch((err: unknown) => {
  console.error(formatTurnError(err));
  process.exitCode = 1;
});
