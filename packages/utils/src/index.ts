/**
 * @addrset/utils - Shared utilities package
 *
 * Logger, error types, error handling and configuration loading.
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, retryWithBackoff } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
