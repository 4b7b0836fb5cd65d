import type { ContentPart, LLMRequest, LLMResponse, ModelClient } from '@toolchat/llm';
import { emptyUsage } from '@toolchat/llm';
import type { SessionConfig } from '../src/types/index.js';

export type ScriptedStep = LLMResponse | Error;

/**
 * Model client that replays a fixed list of replies and records every request.
 * An Error step makes that call reject.
 */
export class ScriptedClient implements ModelClient {
  readonly requests: LLMRequest[] = [];
  private index = 0;

  constructor(private readonly steps: ReadonlyArray<ScriptedStep>) {}

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const step = this.steps[this.index];
    this.index++;

    if (step === undefined) {
      throw new Error(`scripted client has no reply for call ${this.index}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

let responseCounter = 0;

function response(content: ReadonlyArray<ContentPart>, finishReason: LLMResponse['finishReason']): LLMResponse {
  responseCounter++;
  return {
    id: `resp-${responseCounter}`,
    model: 'test-model',
    content,
    finishReason,
    usage: emptyUsage(),
  };
}

export function textResponse(text: string): LLMResponse {
  return response([{ kind: 'TEXT', text }], 'stop');
}

export type ScriptedCall = {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly args: Record<string, unknown>;
};

export function toolCallResponse(calls: ReadonlyArray<ScriptedCall>, text = ''): LLMResponse {
  const parts: ContentPart[] = text.length > 0 ? [{ kind: 'TEXT', text }] : [];
  for (const call of calls) {
    parts.push({ kind: 'TOOL_CALL', ...call });
  }
  return response(parts, 'tool_calls');
}

/** One weather call per round, with ids round-1, round-2, ... */
export function weatherRounds(count: number): LLMResponse[] {
  return Array.from({ length: count }, (_, i) =>
    toolCallResponse([{ toolCallId: `round-${i + 1}`, toolName: 'get_current_weather', args: { location: 'Lyon' } }]),
  );
}

export function testConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
  return {
    model: 'test-model',
    systemInstruction: 'You are a test assistant.',
    temperature: 0,
    maxToolRounds: 10,
    requestTimeoutMs: null,
    saveHistory: false,
    historyDir: 'unused',
    ...overrides,
  };
}
