import type { Middleware, LLMRequest, LLMResponse } from '../types/index.js';

/**
 * Wraps the handler in the middleware list, onion style: the first registered
 * middleware sees the request first and the response last.
 */
export function executeMiddlewareChain(
  middlewares: ReadonlyArray<Middleware>,
  request: LLMRequest,
  handler: (request: LLMRequest) => Promise<LLMResponse>,
): Promise<LLMResponse> {
  let chain = handler;

  for (let i = middlewares.length - 1; i >= 0; i--) {
    const mw = middlewares[i];
    if (!mw) continue;
    const nextChain = chain;

    chain = (req: LLMRequest) => mw(req, nextChain);
  }

  return chain(request);
}
