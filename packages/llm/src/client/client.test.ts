import { describe, it, expect, vi } from 'vitest';
import { Client } from './client.js';
import { emptyUsage } from '../types/index.js';
import type { LLMRequest, LLMResponse, Middleware, ProviderAdapter } from '../types/index.js';

function createMockAdapter(name: string) {
  const response: LLMResponse = {
    id: `response-${name}`,
    model: 'test-model',
    content: [{ kind: 'TEXT', text: `from ${name}` }],
    finishReason: 'stop',
    usage: emptyUsage(),
  };
  const complete = vi.fn(async (_request: LLMRequest) => response);
  const adapter: ProviderAdapter = { name, complete };
  return { adapter, complete };
}

const request: LLMRequest = { model: 'test-model', messages: [] };

describe('Client', () => {
  it('sends requests to its provider', async () => {
    const gemini = createMockAdapter('gemini');
    const client = new Client({ provider: gemini.adapter });

    const response = await client.complete(request);

    expect(response.id).toBe('response-gemini');
    expect(gemini.complete).toHaveBeenCalledWith(request);
  });

  it('passes requests through middleware', async () => {
    const gemini = createMockAdapter('gemini');
    const withTemperature: Middleware = (req, next) => next({ ...req, temperature: 0 });
    const client = new Client({ provider: gemini.adapter, middleware: [withTemperature] });

    await client.complete(request);

    expect(gemini.complete).toHaveBeenCalledWith({ ...request, temperature: 0 });
  });

  it('lets middleware see the response', async () => {
    const gemini = createMockAdapter('gemini');
    const seen: string[] = [];
    const recordId: Middleware = async (req, next) => {
      const response = await next(req);
      seen.push(response.id);
      return response;
    };
    const client = new Client({ provider: gemini.adapter, middleware: [recordId] });

    await client.complete(request);

    expect(seen).toEqual(['response-gemini']);
  });

  it('propagates provider failures', async () => {
    const gemini = createMockAdapter('gemini');
    gemini.complete.mockRejectedValue(new Error('offline'));
    const client = new Client({ provider: gemini.adapter });

    await expect(client.complete(request)).rejects.toThrow('offline');
  });
});
