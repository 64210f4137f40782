/**
 * Quota Store Integration Tests
 * File store, listing inventory and counter wired as at startup
 */

import { writeFile } from 'fs/promises';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createListingService } from '@/services/listing.service.js';
import { createQuotaCounter } from '@/services/quota.counter.js';
import type { QuotaStore } from '@/services/quota.store.js';
import { createQuotaStore } from '@/services/quota.store.js';
import { createFileUploadStore } from '@/services/upload.store.js';
import type { Result } from '@/types/index.js';

import {
  chunksOf,
  createTempDir,
  removeTempDir,
} from '../helpers/test-utils.js';

async function openQuotaStore(
  dir: string,
  ceiling: number
): Promise<Result<QuotaStore>> {
  const files = createFileUploadStore({ dir });
  return createQuotaStore({
    counter: createQuotaCounter(ceiling),
    core: files,
    terminater: files,
    inventory: createListingService({ dir, store: files }),
  });
}

async function requireQuotaStore(
  dir: string,
  ceiling: number
): Promise<QuotaStore> {
  const result = await openQuotaStore(dir, ceiling);
  if (!result.success) {
    throw new Error(result.error.message);
  }
  return result.data;
}

describe('QuotaStore over the file store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should admit, refuse and re-admit as space is freed', async () => {
    const store = await requireQuotaStore(dir, 1000);

    const first = await store.create({ size: 700, metadata: {} });
    const refused = await store.create({ size: 400, metadata: {} });

    expect(first.success).toBe(true);
    expect(refused.success).toBe(false);
    if (!refused.success) {
      expect(refused.error.code).toBe('QUOTA_EXCEEDED');
    }

    if (first.success) {
      expect(await store.terminate(first.data.id)).toEqual({
        success: true,
        data: undefined,
      });
    }
    const admitted = await store.create({ size: 400, metadata: {} });

    expect(admitted.success).toBe(true);
    expect(store.usage().usedBytes).toBe(400);
  });

  it('should count declared sizes, not written bytes', async () => {
    const store = await requireQuotaStore(dir, 1000);
    const created = await store.create({ size: 600, metadata: {} });
    if (!created.success) {
      throw new Error(created.error.message);
    }

    await store.writeChunk(created.data.id, 0, chunksOf('abc'));

    expect(store.usage().usedBytes).toBe(600);
  });

  it('should recompute the same usage after a restart', async () => {
    const before = await requireQuotaStore(dir, 1000);
    await before.create({ size: 250, metadata: {} });
    const partial = await before.create({ size: 300, metadata: {} });
    if (partial.success) {
      await before.writeChunk(partial.data.id, 0, chunksOf('12345'));
    }

    const after = await requireQuotaStore(dir, 1000);

    expect(after.usage()).toEqual(before.usage());
    expect(after.usage().usedBytes).toBe(550);
  });

  it('should refuse to start over a corrupt record', async () => {
    await writeFile(path.join(dir, 'broken.info'), 'not json', 'utf8');

    const result = await openQuotaStore(dir, 1000);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('CORRUPT');
      expect(result.error.message).toBe(
        'Unable to seed quota usage: Unable to resolve upload broken: Upload info is not valid JSON'
      );
    }
  });

  it('should never admit more than the ceiling under concurrent creates', async () => {
    const store = await requireQuotaStore(dir, 1000);

    const results = await Promise.all(
      Array.from({ length: 10 }, () =>
        store.create({ size: 150, metadata: {} })
      )
    );

    expect(results.filter((result) => result.success)).toHaveLength(6);
    expect(store.usage().usedBytes).toBe(900);
  });
});
