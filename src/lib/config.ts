/**
 * Server Configuration
 * Parsed from the environment (and `.env` via dotenv) with zod
 */

import { z } from 'zod';

import type { ListenerConfig } from '../types/index.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const byteCount = z.coerce.number().int().nonnegative();

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', ''])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(1080),
  UNIX_SOCK: z.string().optional(),
  UPLOAD_DIR: z.string().min(1).default('./data'),
  BASE_PATH: z.string().min(1).default('/files/'),
  MAX_SIZE: byteCount.default(0),
  STORE_SIZE: byteCount.default(0),
  TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
  BEHIND_PROXY: booleanFlag.default('false'),
});

export interface ServerConfig {
  listener: ListenerConfig;
  uploadDir: string;
  /** Upload endpoint mount, always with leading and trailing slash */
  basePath: string;
  listingPath: string;
  /** 0 = unlimited */
  maxSize: number;
  /** Quota ceiling; 0 = quota disabled */
  storeSize: number;
  behindProxy: boolean;
}

/**
 * Ensure a path starts and ends with `/`
 */
export function normalizeBasePath(value: string): string {
  let result = value.trim();
  if (!result.startsWith('/')) {
    result = `/${result}`;
  }
  if (!result.endsWith('/')) {
    result = `${result}/`;
  }
  return result;
}

/**
 * A single upload must fit into the store
 */
export function effectiveMaxSize(maxSize: number, storeSize: number): number {
  if (storeSize > 0 && (maxSize === 0 || maxSize > storeSize)) {
    return storeSize;
  }
  return maxSize;
}

/**
 * Load configuration from an environment record
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  const socketPath = values.UNIX_SOCK?.trim();

  return {
    listener: {
      transport:
        socketPath !== undefined && socketPath !== ''
          ? { kind: 'unix', path: socketPath }
          : { kind: 'tcp', host: values.HOST, port: values.PORT },
      readTimeoutMs: values.TIMEOUT_MS,
      writeTimeoutMs: values.TIMEOUT_MS,
    },
    uploadDir: values.UPLOAD_DIR,
    basePath: normalizeBasePath(values.BASE_PATH),
    listingPath: '/',
    maxSize: effectiveMaxSize(values.MAX_SIZE, values.STORE_SIZE),
    storeSize: values.STORE_SIZE,
    behindProxy: values.BEHIND_PROXY,
  };
}
