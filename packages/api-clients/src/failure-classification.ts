/**
 * Failure classification
 * ======================
 * Maps axios failures onto the shared error types, and decides whether a
 * failure is an authentication problem. HTTP status (401/403) is the primary
 * signal; message text containing "forbidden" or "authorization" is the
 * fallback for servers that report auth failures under other statuses.
 */

import axios, { type AxiosError } from 'axios';
import {
  AppError,
  AuthError,
  NotFoundError,
  ServerError,
  TransportError,
} from '@addrset/utils';

const AUTH_STATUS_CODES: readonly number[] = [401, 403];
const AUTH_MESSAGE_PATTERN = /forbidden|authorization/i;
const TIMEOUT_CODES: readonly string[] = ['ECONNABORTED', 'ETIMEDOUT'];

export type FailureClass = 'auth' | 'fatal';

export interface FailureContext {
  apiName: string;
  timeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function mentionsAuthFailure(text: string): boolean {
  return AUTH_MESSAGE_PATTERN.test(text);
}

/**
 * Pull a human-readable message out of an error body
 */
export function extractServerMessage(data: unknown, fallback: string): string {
  if (typeof data === 'string' && data.trim().length > 0) {
    return data.trim();
  }
  if (isRecord(data)) {
    for (const key of ['message', 'error', 'detail']) {
      const value = data[key];
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  return fallback;
}

export function isTimeout(error: AxiosError): boolean {
  return (
    (error.code !== undefined && TIMEOUT_CODES.includes(error.code)) ||
    error.message.toLowerCase().includes('timeout')
  );
}

/**
 * Convert an axios failure into TransportError, AuthError, NotFoundError or
 * ServerError
 */
export function toAddressSetError(error: AxiosError, context: FailureContext): AppError {
  const url = error.config?.url;
  const method = error.config?.method?.toUpperCase();

  if (error.response) {
    const { status, statusText, data } = error.response;
    const message = extractServerMessage(data, statusText || error.message);
    const described = statusText && message !== statusText ? `${statusText}: ${message}` : message;

    if (AUTH_STATUS_CODES.includes(status)) {
      return new AuthError(`${status} ${described}`, status, { apiName: context.apiName, url, method });
    }

    if (status === 404) {
      return new NotFoundError('Address set resource', url, {
        apiName: context.apiName,
        method,
        upstreamMessage: message,
      });
    }

    if (mentionsAuthFailure(described)) {
      return new AuthError(`${status} ${described}`, status, { apiName: context.apiName, url, method });
    }

    return new ServerError(`${context.apiName} responded ${status}: ${described}`, status, data, {
      apiName: context.apiName,
      url,
      method,
    });
  }

  if (isTimeout(error)) {
    return new TransportError(
      `Request to ${context.apiName} timed out after ${context.timeoutMs}ms`,
      true,
      { apiName: context.apiName, timeoutMs: context.timeoutMs, url, method }
    );
  }

  return new TransportError(`Network error: ${error.message}`, false, {
    apiName: context.apiName,
    code: error.code,
    url,
    method,
  });
}

/**
 * Decide whether a failure is an authentication problem. Anything else is
 * fatal to the caller.
 */
export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof AuthError) {
    return 'auth';
  }
  if (axios.isAxiosError(error) && error.response && AUTH_STATUS_CODES.includes(error.response.status)) {
    return 'auth';
  }

  const text = error instanceof Error ? error.message : String(error);
  return mentionsAuthFailure(text) ? 'auth' : 'fatal';
}
