/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { ZodError } from 'zod';
import { AuthError, handleError as logHandledError } from '@addrset/utils';

const SENSITIVE_PATTERNS = [/api[_-]?key\s*[:=]/i, /bearer\s+\S+/i, /secret/i, /password/i];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof ZodError) {
    return `Invalid arguments: ${error.issues.map((issue) => issue.message).join('; ')}`;
  }
  if (error instanceof AuthError) {
    return `${sanitizeErrorMessage(error.message)} (check ADDRSET_API_KEY)`;
  }
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }
  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }
  return 'An unexpected error occurred';
}

/**
 * Log the error and return the message to show the user
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logHandledError(error, context);
  return formatError(error);
}
