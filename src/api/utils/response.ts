/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import { logError } from '../../lib/logger.js';
import type { ErrorResponse, ErrorStatus } from '../types.js';
import { getErrorStatus, isRetryable } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') ?? 'unknown';
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  status: ErrorStatus = getErrorStatus(error.code)
): Response {
  const requestId = getRequestId(c);

  if (status >= 500) {
    logError('ResponseOutgoing', {
      status,
      code: error.code,
      message: error.message,
      requestId,
    });
  }

  const body: ErrorResponse = {
    error: {
      code: error.code,
      message: error.message,
      details: error.details,
      retryable: isRetryable(error.code),
      requestId,
    },
  };
  return c.json(body, status);
}
