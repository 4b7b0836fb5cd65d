import type { Middleware } from '@toolchat/llm';
import { errorFields, type Logger } from './logger.js';

/**
 * Client middleware that logs every model call with its duration and outcome.
 */
export function createLoggingMiddleware(logger: Logger): Middleware {
  return async (request, next) => {
    const startedAt = Date.now();
    logger.debug('model request', {
      model: request.model,
      messages: request.messages.length,
      tools: request.tools?.length ?? 0,
    });

    try {
      const response = await next(request);
      logger.info('model response', {
        model: response.model,
        finishReason: response.finishReason,
        totalTokens: response.usage.totalTokens,
        durationMs: Date.now() - startedAt,
      });
      return response;
    } catch (err) {
      logger.warn('model request failed', { ...errorFields(err), durationMs: Date.now() - startedAt });
      throw err;
    }
  };
}
