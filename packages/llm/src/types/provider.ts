import type { LLMRequest } from './request.js';
import type { LLMResponse } from './response.js';

export interface ProviderAdapter {
  readonly name: string;
  complete(request: LLMRequest): Promise<LLMResponse>;
}
