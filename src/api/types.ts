/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

/**
 * Extended Hono context with request id
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    retryable: boolean;
    requestId: string;
  };
}

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  OFFSET_MISMATCH: 409,
  QUOTA_EXCEEDED: 413,
  SIZE_EXCEEDED: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  UPLOAD_LOCKED: 423,
  CORRUPT: 500,
  INTERNAL_ERROR: 500,
  IO_FAILURE: 503,
} as const;

export type ErrorStatus = (typeof ERROR_STATUS_MAP)[keyof typeof ERROR_STATUS_MAP];

/**
 * Failures worth retrying unchanged. Quota and offset failures are not:
 * the client has to re-sync or give up.
 */
const RETRYABLE_CODES: ReadonlySet<string> = new Set([
  'IO_FAILURE',
  'UPLOAD_LOCKED',
]);

function isMappedCode(code: string): code is keyof typeof ERROR_STATUS_MAP {
  return code in ERROR_STATUS_MAP;
}

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ErrorStatus {
  return isMappedCode(code) ? ERROR_STATUS_MAP[code] : 500;
}

export function isRetryable(code: string): boolean {
  return RETRYABLE_CODES.has(code);
}
