import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Logger } from './logger.js';
import { toError } from './logger.js';

/**
 * Sanitize error message for client response.
 * In production, returns generic messages to prevent information disclosure.
 */
export function sanitizeErrorMessage(
  error: unknown,
  defaultMessage: string = 'An error occurred',
  isProduction: boolean = process.env.NODE_ENV === 'production',
): string {
  if (isProduction) {
    return defaultMessage;
  }
  return toError(error).message;
}

/**
 * Get HTTP status code from error
 */
export function getErrorStatusCode(error: unknown): ContentfulStatusCode {
  if (error instanceof HTTPException) {
    return error.status;
  }
  return 500;
}

/**
 * Log full error details server-side and return a sanitized JSON error
 */
export function handleError(c: Context, error: unknown, logger: Logger, defaultMessage?: string): Response {
  const statusCode = getErrorStatusCode(error);

  logger.error('Request error', {
    path: c.req.path,
    method: c.req.method,
    statusCode,
    error: toError(error),
  });

  return c.json({ error: sanitizeErrorMessage(error, defaultMessage) }, statusCode);
}
