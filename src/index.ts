/**
 * Application Entry Point
 *
 * Wires the store, the optional quota store, the listing service and the
 * listener, then serves the Hono application. Any startup failure logs and
 * exits before a listener is bound.
 */

import 'dotenv/config';
import { mkdir } from 'fs/promises';

import { createApp } from './api/app.js';
import { ConfigError, loadConfig } from './lib/config.js';
import type { ServerConfig } from './lib/config.js';
import { describeTransport } from './lib/listener.js';
import { logError, logEvent } from './lib/logger.js';
import {
  createFileUploadStore,
  createListingService,
  createQuotaCounter,
  createQuotaStore,
  createStoreComposer,
} from './services/index.js';
import { startServer } from './server.js';

function fatal(message: string): never {
  logError('StartupFailed', { message });
  process.exit(1);
}

function megabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(2)}MB`;
}

async function main(): Promise<void> {
  let config: ServerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    fatal(error instanceof ConfigError ? error.message : String(error));
  }

  logEvent('StorageDirectory', { dir: config.uploadDir });
  try {
    await mkdir(config.uploadDir, { recursive: true, mode: 0o774 });
  } catch (error) {
    fatal(
      `Unable to ensure directory exists: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  const composer = createStoreComposer();
  const fileStore = createFileUploadStore({ dir: config.uploadDir });
  fileStore.useIn(composer);

  const listingService = createListingService({
    dir: config.uploadDir,
    store: fileStore,
  });

  if (config.storeSize > 0) {
    const quotaResult = await createQuotaStore({
      counter: createQuotaCounter(config.storeSize),
      core: composer.require('core'),
      terminater: composer.require('terminater'),
      inventory: listingService,
    });
    if (!quotaResult.success) {
      fatal(quotaResult.error.message);
    }
    quotaResult.data.useIn(composer);

    const { usedBytes } = quotaResult.data.usage();
    logEvent('StorageQuota', {
      size: megabytes(config.storeSize),
      used: megabytes(usedBytes),
    });
  }

  logEvent('MaximumSize', {
    size: config.maxSize === 0 ? 'unlimited' : megabytes(config.maxSize),
  });
  logEvent('BasePath', { path: config.basePath });
  logEvent('Capabilities', { summary: composer.capabilities() });

  const app = createApp({
    composer,
    listingService,
    basePath: config.basePath,
    listingPath: config.listingPath,
    maxSize: config.maxSize,
    behindProxy: config.behindProxy,
  });

  const serverResult = await startServer(app, config.listener);
  if (!serverResult.success) {
    fatal(serverResult.error.message);
  }
  const server = serverResult.data;

  const address = describeTransport(config.listener.transport);
  logEvent('Listening', {
    address,
    url:
      config.listener.transport.kind === 'unix'
        ? `http+unix://${address}${config.basePath}`
        : `http://${address}${config.basePath}`,
  });

  const shutdown = (signal: string): void => {
    logEvent('Shutdown', { signal });
    void server.close().then(
      () => process.exit(0),
      (error: unknown) =>
        fatal(error instanceof Error ? error.message : String(error))
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  fatal(error instanceof Error ? error.stack ?? error.message : String(error));
});
