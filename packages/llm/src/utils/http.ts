import { NetworkError, RequestTimeoutError } from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly provider: string;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * Fetches with timeout support, header merging, and JSON body serialization.
 * Returns both the raw response and parsed JSON body.
 *
 * Non-2xx responses are mapped through mapHttpError; failures before a response
 * arrives become NetworkError, or RequestTimeoutError once the timeout fires.
 */
export async function fetchWithTimeout(
  options: FetchOptions,
): Promise<FetchResult> {
  const {
    url,
    method = 'GET',
    headers: customHeaders = {},
    body: bodyData,
    timeout,
    provider,
  } = options;

  const timeoutController = new AbortController();

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeout?.requestMs) {
    timeoutId = setTimeout(() => {
      timeoutController.abort();
    }, timeout.requestMs);
  }

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    let response: globalThis.Response;
    try {
      response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: timeoutController.signal,
      });
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      if (timeoutController.signal.aborted) {
        throw new RequestTimeoutError(`Request timed out after ${timeout?.requestMs ?? 0}ms`, cause);
      }
      throw new NetworkError(`Network error: ${cause.message}`, cause);
    }

    if (!response.ok) {
      const text = await response.text();
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        provider,
        raw: text,
      });
    }

    const parsedBody: unknown = await response.json();

    return {
      response,
      body: parsedBody,
    };
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
  }
}

