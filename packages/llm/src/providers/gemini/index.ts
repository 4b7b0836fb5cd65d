import type { ProviderAdapter, LLMRequest, LLMResponse } from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';

export class GeminiAdapter implements ProviderAdapter {
  readonly name = 'gemini';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, options?: { readonly baseUrl?: string }) {
    this.apiKey = apiKey;
    this.baseUrl = options?.baseUrl || GEMINI_BASE_URL;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const { url, headers, body } = translateRequest(request, this.apiKey, this.baseUrl);

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout,
      provider: 'gemini',
    });

    return translateResponse(result.body, request.model);
  }
}

export { translateRequest, translateContents } from './request.js';
export { translateResponse } from './response.js';
