/**
 * Health Route
 * Liveness plus store capabilities and quota usage
 */

import { Hono } from 'hono';

import type { StoreComposer } from '../../services/store-composer.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: { composer: StoreComposer }): Hono {
  const { composer } = deps;
  const app = new Hono();

  /**
   * GET /health
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      capabilities: composer.capabilities(),
      quota: composer.get('quota')?.usage() ?? null,
    });
  });

  return app;
}
