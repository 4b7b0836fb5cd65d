import {
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ContentFilterError,
  ServerError,
  ProviderError,
} from '../types/error.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly raw?: unknown;
};

/**
 * Maps HTTP status codes and response bodies to appropriate ProviderError subclasses.
 * Uses status code-based classification with message-based fallback for ambiguous codes.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider, raw } = options;

  switch (statusCode) {
    case 400:
      return classifyHttp400(body, provider, raw, statusCode);

    case 401:
      return new AuthenticationError(`Authentication failed: ${body}`, statusCode, provider, raw);

    case 403:
      return new AccessDeniedError(`Access denied: ${body}`, statusCode, provider, raw);

    case 404:
      return new NotFoundError(`Resource not found: ${body}`, statusCode, provider, raw);

    case 413:
      return new ContextLengthError(`Context length exceeded: ${body}`, statusCode, provider, raw);

    case 422:
      return new InvalidRequestError(`Unprocessable entity: ${body}`, statusCode, provider, raw);

    case 429:
      return new RateLimitError(`Rate limit exceeded: ${body}`, statusCode, provider, raw);

    default:
      if (statusCode >= 500) {
        return new ServerError(`Server error: ${body}`, statusCode, provider, raw);
      }

      return new ProviderError(`HTTP ${statusCode}: ${body}`, statusCode, provider, raw);
  }
}

/**
 * Gemini reports invalid keys as 400 INVALID_ARGUMENT, so the body decides between
 * authentication, content filter, context length and plain invalid request.
 */
function classifyHttp400(
  body: string,
  provider: string,
  raw: unknown,
  statusCode: number,
): ProviderError {
  const lowerBody = body.toLowerCase();

  if (lowerBody.includes('api key not valid') || lowerBody.includes('api_key_invalid')) {
    return new AuthenticationError(`Authentication failed: ${body}`, statusCode, provider, raw);
  }

  if (
    lowerBody.includes('content_filter') ||
    lowerBody.includes('content_policy') ||
    lowerBody.includes('safety')
  ) {
    return new ContentFilterError(`Content filtered: ${body}`, statusCode, provider, raw);
  }

  if (
    lowerBody.includes('context_length') ||
    lowerBody.includes('too many tokens') ||
    lowerBody.includes('maximum context')
  ) {
    return new ContextLengthError(`Context length exceeded: ${body}`, statusCode, provider, raw);
  }

  return new InvalidRequestError(`Invalid request: ${body}`, statusCode, provider, raw);
}
