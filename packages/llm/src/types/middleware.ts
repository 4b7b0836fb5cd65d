import type { LLMRequest } from './request.js';
import type { LLMResponse } from './response.js';

export type Middleware = (
  request: LLMRequest,
  next: (request: LLMRequest) => Promise<LLMResponse>,
) => Promise<LLMResponse>;
