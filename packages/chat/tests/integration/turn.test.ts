import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Client, GeminiAdapter, RateLimitError } from '@toolchat/llm';
import { createChatSession, type ChatSession } from '../../src/session/session.js';
import { UpstreamError, WEATHER_REPORT } from '../../src/index.js';
import { testConfig } from '../helpers.js';

function geminiReply(parts: ReadonlyArray<Record<string, unknown>>): Response {
  return new Response(
    JSON.stringify({
      candidates: [{ content: { role: 'model', parts }, finishReason: 'STOP' }],
      usageMetadata: { promptTokenCount: 20, candidatesTokenCount: 5, totalTokenCount: 25 },
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

function sentBody(callIndex: number): Record<string, unknown> {
  const init = vi.mocked(globalThis.fetch).mock.calls[callIndex]?.[1];
  return JSON.parse(String(init?.body));
}

describe('chat turn over the Gemini adapter', () => {
  let session: ChatSession;

  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn());
    const client = new Client({ provider: new GeminiAdapter('test-secret', { baseUrl: 'https://gemini.test' }) });
    session = createChatSession({ client, config: testConfig({ model: 'gemini-2.5-flash-lite' }) });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('runs the calculator round trip and returns the final answer', async () => {
    vi.mocked(globalThis.fetch)
      .mockResolvedValueOnce(geminiReply([{ functionCall: { name: 'calculate', args: { expression: '12 * (3+4)' } } }]))
      .mockResolvedValueOnce(geminiReply([{ text: '12 * (3+4) is 84.' }]));

    const produced = await session.submit('What is 12 * (3+4)?');

    expect(produced).toHaveLength(4);
    expect(produced[2]).toMatchObject({ role: 'tool', toolName: 'calculate', content: '84', error: null });
    expect(produced[3]).toEqual({ role: 'assistant', content: '12 * (3+4) is 84.', toolCalls: [] });

    const first = sentBody(0);
    expect(first['systemInstruction']).toEqual({ role: 'user', parts: [{ text: 'You are a test assistant.' }] });
    expect(first['generationConfig']).toEqual({ temperature: 0 });

    expect(sentBody(1)['contents']).toEqual([
      { role: 'user', parts: [{ text: 'What is 12 * (3+4)?' }] },
      { role: 'model', parts: [{ functionCall: { name: 'calculate', args: { expression: '12 * (3+4)' } } }] },
      { role: 'user', parts: [{ functionResponse: { name: 'calculate', response: { result: '84' } } }] },
    ]);
  });

  it('answers a plain question in two messages', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValueOnce(geminiReply([{ text: 'Hello! How can I help?' }]));

    const produced = await session.submit('Hello');

    expect(produced.map((message) => message.role)).toEqual(['user', 'assistant']);
    expect(globalThis.fetch).toHaveBeenCalledTimes(1);
  });

  it('returns the static weather report', async () => {
    vi.mocked(globalThis.fetch)
      .mockResolvedValueOnce(geminiReply([{ functionCall: { name: 'get_current_weather', args: { location: 'Rome' } } }]))
      .mockResolvedValueOnce(geminiReply([{ text: 'It is sunny in Rome.' }]));

    const produced = await session.submit('Weather in Rome?');

    expect(produced[2]).toMatchObject({ role: 'tool', content: WEATHER_REPORT, error: null });
  });

  it('reports an HTTP failure as UpstreamError and keeps only the user message', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValueOnce(new Response('quota exceeded', { status: 429 }));

    const error = await session.submit('Hello').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error instanceof UpstreamError && error.cause).toBeInstanceOf(RateLimitError);
    expect(session.messages()).toEqual([{ role: 'user', content: 'Hello' }]);
  });
});
