/**
 * Request ID Middleware
 * Tags every request with an id, echoed in `X-Request-Id`
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

export function createRequestIdMiddleware() {
  return async function requestIdMiddleware(c: Context, next: Next) {
    const requestId = nanoid();
    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);
    await next();
  };
}
