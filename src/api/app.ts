/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import { logError, printRequestLine } from '../lib/logger.js';
import type { ListingService } from '../services/listing.service.js';
import type { StoreComposer } from '../services/store-composer.js';

import { createRequestIdMiddleware } from './middleware/request-id.js';
import { createHealthRoutes } from './routes/health.js';
import { createListingRoutes } from './routes/listing.js';
import { createUploadRoutes } from './routes/uploads.js';
import { errorResponse } from './utils/response.js';

/**
 * App configuration
 */
export interface AppConfig {
  composer: StoreComposer;
  listingService: Pick<ListingService, 'list'>;
  /** Upload endpoint mount, e.g. `/files/` */
  basePath: string;
  /** Listing page mount, `/` */
  listingPath?: string;
  /** 0 = unlimited */
  maxSize: number;
  behindProxy: boolean;
  /** Disable the request log line (tests) */
  quiet?: boolean;
}

const TUS_HEADERS = [
  'Tus-Resumable',
  'Tus-Version',
  'Tus-Extension',
  'Tus-Max-Size',
  'Upload-Length',
  'Upload-Offset',
  'Upload-Metadata',
  'Location',
];

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const {
    composer,
    listingService,
    basePath,
    listingPath = '/',
    maxSize,
    behindProxy,
    quiet = false,
  } = config;
  const app = new Hono();

  // Global middleware
  if (!quiet) {
    app.use('*', logger(printRequestLine));
  }
  app.use('*', createRequestIdMiddleware());
  const corsMiddleware = cors({
    origin: '*',
    allowMethods: ['POST', 'GET', 'HEAD', 'PATCH', 'DELETE', 'OPTIONS'],
    allowHeaders: [...TUS_HEADERS, 'Content-Type', 'X-Requested-With'],
    exposeHeaders: [...TUS_HEADERS, 'X-Request-Id'],
  });
  app.use('*', (c, next) => {
    // cors() answers every OPTIONS itself; a plain OPTIONS is discovery
    if (
      c.req.method === 'OPTIONS' &&
      c.req.header('access-control-request-method') === undefined
    ) {
      return next();
    }
    return corsMiddleware(c, next);
  });

  app.route('/', createHealthRoutes({ composer }));
  app.route(
    '/',
    createUploadRoutes({ composer, basePath, maxSize, behindProxy })
  );

  // The listing shares the root only when uploads are mounted elsewhere
  if (listingPath !== basePath) {
    app.route(listingPath, createListingRoutes({ listingService, basePath }));
  }

  // 404 handler
  app.notFound((c) => {
    return errorResponse(c, {
      code: 'NOT_FOUND',
      message: 'Endpoint not found',
    });
  });

  // Global error handler
  app.onError((err, c) => {
    logError('UnhandledError', { message: err.message });
    return errorResponse(c, {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
