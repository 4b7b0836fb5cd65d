import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fetchWithTimeout } from './http.js';
import { NetworkError, RequestTimeoutError, ServerError } from '../types/error.js';

function jsonResponse(body: unknown): globalThis.Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('fetchWithTimeout', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('returns the parsed JSON body on success', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(jsonResponse({ test: 'data' }));

    const result = await fetchWithTimeout({ url: 'https://example.com/api', provider: 'test' });

    expect(result.body).toEqual({ test: 'data' });
    expect(result.response.status).toBe(200);
  });

  it('maps non-2xx responses through the HTTP error mapping', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(
      new Response('Internal Server Error', { status: 500 }),
    );

    const error = await fetchWithTimeout({ url: 'https://example.com/api', provider: 'gemini' }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ServerError);
    expect(error).toMatchObject({ statusCode: 500, provider: 'gemini' });
  });

  it('sends a JSON body with merged headers', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(jsonResponse({}));

    await fetchWithTimeout({
      url: 'https://example.com/api',
      method: 'POST',
      headers: { 'X-Test': '1' },
      body: { key: 'value' },
      provider: 'test',
    });

    const init = vi.mocked(globalThis.fetch).mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"key":"value"}');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'X-Test': '1' });
  });

  it('wraps transport failures in NetworkError', async () => {
    vi.mocked(globalThis.fetch).mockRejectedValue(new TypeError('fetch failed'));

    const error = await fetchWithTimeout({ url: 'https://example.com/api', provider: 'test' }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: 'Network error: fetch failed' });
  });

  it('reports an abort after the timeout as RequestTimeoutError', async () => {
    vi.mocked(globalThis.fetch).mockImplementation(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const abortError = new Error('This operation was aborted');
            abortError.name = 'AbortError';
            reject(abortError);
          });
        }),
    );

    const error = await fetchWithTimeout({
      url: 'https://example.com/api',
      provider: 'test',
      timeout: { requestMs: 5 },
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RequestTimeoutError);
    expect(error).toMatchObject({ message: 'Request timed out after 5ms' });
  });
});
