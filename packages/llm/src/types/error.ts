export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export class RequestTimeoutError extends SDKError {}

export class NetworkError extends SDKError {}

export class ProviderError extends SDKError {
  readonly statusCode: number;
  readonly provider: string;
  readonly raw: unknown;

  constructor(message: string, statusCode: number, provider: string, raw: unknown = null) {
    super(message);
    this.statusCode = statusCode;
    this.provider = provider;
    this.raw = raw;
  }
}

export class AuthenticationError extends ProviderError {}

export class AccessDeniedError extends ProviderError {}

export class NotFoundError extends ProviderError {}

export class InvalidRequestError extends ProviderError {}

export class ContextLengthError extends ProviderError {}

export class ContentFilterError extends ProviderError {}

export class RateLimitError extends ProviderError {}

export class ServerError extends ProviderError {}
