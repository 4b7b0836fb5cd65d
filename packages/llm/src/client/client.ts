import type { LLMRequest, LLMResponse, Middleware, ProviderAdapter } from '../types/index.js';
import { executeMiddlewareChain } from './middleware.js';
import type { ClientConfig } from './config.js';

/**
 * The slice of Client that conversation code depends on. Tests substitute scripted fakes.
 */
export interface ModelClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
}

export class Client implements ModelClient {
  private readonly provider: ProviderAdapter;
  private readonly middlewares: ReadonlyArray<Middleware>;

  constructor(config: ClientConfig) {
    this.provider = config.provider;
    this.middlewares = config.middleware ?? [];
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    return executeMiddlewareChain(this.middlewares, request, (req) => this.provider.complete(req));
  }
}
