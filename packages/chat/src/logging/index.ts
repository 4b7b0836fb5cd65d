export { ConsoleLogger, noopLogger, errorFields, LOG_LEVELS, type Logger, type LogLevel, type LogSink } from './logger.js';
export { createLoggingMiddleware } from './middleware.js';
