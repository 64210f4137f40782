/**
 * Listener Factory
 *
 * Binds a net.Server to a TCP address or a Unix socket path and hands every
 * accepted connection, wrapped with read/write deadlines, to a callback.
 * Binding happens once at startup; failures are returned, never retried.
 */

import { rm } from 'fs/promises';
import net from 'net';

import type {
  ListenerConfig,
  ListenerTransport,
  Result,
} from '../types/index.js';
import { LISTENER_ERROR, failure, success } from '../types/index.js';

import { DeadlineConnection } from './deadline-connection.js';

/**
 * Human-readable address, e.g. `0.0.0.0:1080` or `/tmp/depot.sock`
 */
export function describeTransport(transport: ListenerTransport): string {
  return transport.kind === 'unix'
    ? transport.path
    : `${transport.host}:${transport.port}`;
}

function bindFailure(transport: ListenerTransport, error: unknown) {
  const code =
    error instanceof Error && 'code' in error && error.code === 'EADDRINUSE'
      ? LISTENER_ERROR.ADDRESS_IN_USE
      : LISTENER_ERROR.BIND_FAILURE;
  const message = error instanceof Error ? error.message : String(error);
  return failure(
    code,
    `Unable to listen on ${describeTransport(transport)}: ${message}`,
    { address: describeTransport(transport) }
  );
}

/**
 * Create a listening server. A stale file at a Unix socket path is removed
 * before binding.
 */
export async function createListener(
  config: ListenerConfig,
  onConnection: (connection: DeadlineConnection) => void
): Promise<Result<net.Server>> {
  const { transport, readTimeoutMs, writeTimeoutMs } = config;

  if (transport.kind === 'unix') {
    try {
      await rm(transport.path, { force: true });
    } catch (error) {
      return bindFailure(transport, error);
    }
  }

  const server = net.createServer((socket) => {
    onConnection(
      new DeadlineConnection(socket, { readTimeoutMs, writeTimeoutMs })
    );
  });

  return new Promise((resolve) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      resolve(bindFailure(transport, error));
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve(success(server));
    };

    server.once('error', onError);
    server.once('listening', onListening);

    if (transport.kind === 'unix') {
      server.listen(transport.path);
    } else {
      server.listen(transport.port, transport.host);
    }
  });
}

/**
 * Stop accepting connections and wait for open ones to finish
 */
export function closeListener(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
