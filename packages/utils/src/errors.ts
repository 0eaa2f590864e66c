/**
 * Custom Error Classes
 * ====================
 * Standardized error classes shared by the client, services and CLI.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Transport error - the remote service could not be reached, or did not
 * answer before the request timeout
 */
export class TransportError extends AppError {
  public readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean = false, context?: ErrorContext) {
    super(message, 'TRANSPORT_ERROR', 503, { timedOut, ...context });
    this.timedOut = timedOut;
  }
}

/**
 * Authentication error - the remote service rejected the credentials
 */
export class AuthError extends AppError {
  constructor(message: string = 'Authentication failed', statusCode: number = 401, context?: ErrorContext) {
    super(message, 'AUTH_ERROR', statusCode, context);
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Server error - any other non-success answer. The upstream message is kept
 * verbatim.
 */
export class ServerError extends AppError {
  public readonly upstreamStatus?: number;
  public readonly responseBody?: unknown;

  constructor(
    message: string,
    upstreamStatus?: number,
    responseBody?: unknown,
    context?: ErrorContext,
    code: string = 'SERVER_ERROR'
  ) {
    super(message, code, upstreamStatus ?? 502, { upstreamStatus, ...context });
    this.upstreamStatus = upstreamStatus;
    this.responseBody = responseBody;
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Transport failures and 5xx answers may succeed on a later attempt.
 * Auth, not-found and configuration errors never do.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof TransportError) {
    return true;
  }
  if (error instanceof ServerError) {
    return error.code === 'SERVER_ERROR' && (error.upstreamStatus ?? 0) >= 500;
  }
  return false;
}
