/**
 * HTTP Server Bootstrap
 *
 * The HTTP server never binds on its own: the listener accepts sockets,
 * wraps them with deadlines and injects them through `connection`.
 */

import { createServer } from 'http';
import type { Server as HttpServer } from 'http';
import type { Server as NetServer } from 'net';

import { getRequestListener } from '@hono/node-server';
import type { Hono } from 'hono';

import { closeListener, createListener } from './lib/listener.js';
import { logError } from './lib/logger.js';
import type { ListenerConfig, Result } from './types/index.js';
import { success } from './types/index.js';

export interface RunningServer {
  listener: NetServer;
  httpServer: HttpServer;
  /** Stop accepting, drop idle keep-alive connections, wait for the rest */
  close(): Promise<void>;
}

export async function startServer(
  app: Hono,
  config: ListenerConfig
): Promise<Result<RunningServer>> {
  const httpServer = createServer(getRequestListener(app.fetch));
  httpServer.on('error', (error) => {
    logError('ServerError', { message: error.message });
  });

  const listenerResult = await createListener(config, (connection) => {
    httpServer.emit('connection', connection);
  });
  if (!listenerResult.success) {
    return listenerResult;
  }

  const listener = listenerResult.data;
  listener.on('error', (error) => {
    logError('ListenerError', { message: error.message });
  });

  return success({
    listener,
    httpServer,
    async close() {
      const closing = closeListener(listener);
      httpServer.closeIdleConnections();
      await closing;
    },
  });
}
