/**
 * Quota Store
 *
 * Decorates a data store and a terminater with a storage ceiling.
 *
 * Policy:
 * - Space is reserved at creation for the full declared size, not as bytes
 *   arrive, so a declared-but-unwritten upload already counts.
 * - Termination returns the declared size only after the delete succeeds.
 * - The counter is seeded from the sizes recorded on disk, so a restart
 *   recomputes the same total.
 *
 * Incomplete uploads keep their reservation until they are terminated.
 */

import type {
  CreateUploadParams,
  DataStore,
  QuotaAware,
  QuotaUsage,
  Result,
  Terminater,
  UploadInfo,
  UploadInventory,
} from '../types/index.js';
import { UPLOAD_ERROR, failure, success } from '../types/index.js';

import type { QuotaCounter } from './quota.counter.js';
import type { StoreComposer } from './store-composer.js';

/**
 * Quota store: data store, terminater and quota-aware at once
 */
export interface QuotaStore extends DataStore, Terminater, QuotaAware {
  useIn(composer: StoreComposer): void;
}

/**
 * Create a QuotaStore, seeding the counter from the uploads on disk
 */
export async function createQuotaStore(deps: {
  counter: QuotaCounter;
  core: DataStore;
  terminater: Terminater;
  inventory: UploadInventory;
}): Promise<Result<QuotaStore>> {
  const { counter, core, terminater, inventory } = deps;

  const existing = await inventory.collect();
  if (!existing.success) {
    return failure(
      existing.error.code,
      `Unable to seed quota usage: ${existing.error.message}`,
      existing.error.details
    );
  }
  counter.reset(existing.data.reduce((total, info) => total + info.size, 0));

  const store: QuotaStore = {
    /**
     * Reserve the declared size, then create
     */
    async create(params: CreateUploadParams): Promise<Result<UploadInfo>> {
      if (!Number.isSafeInteger(params.size) || params.size < 0) {
        return failure(
          'VALIDATION_ERROR',
          'Upload size must be a non-negative integer'
        );
      }
      if (!counter.tryReserve(params.size)) {
        const { remaining, ceiling } = counter.usage();
        return failure(
          UPLOAD_ERROR.QUOTA_EXCEEDED,
          'Upload does not fit into the remaining storage',
          { size: params.size, remaining, ceiling }
        );
      }

      const result = await core.create(params);
      if (!result.success) {
        counter.release(params.size);
      }
      return result;
    },

    writeChunk(id, offset, chunks) {
      return core.writeChunk(id, offset, chunks);
    },

    getInfo(id) {
      return core.getInfo(id);
    },

    read(id) {
      return core.read(id);
    },

    /**
     * Delete, then release the declared size
     */
    async terminate(id: string): Promise<Result<void>> {
      const infoResult = await core.getInfo(id);
      if (!infoResult.success) {
        return infoResult;
      }

      const result = await terminater.terminate(id);
      if (!result.success) {
        return result;
      }

      counter.release(infoResult.data.size);
      return success(undefined);
    },

    usage(): QuotaUsage {
      return counter.usage();
    },

    useIn(composer: StoreComposer): void {
      composer.register('core', store);
      composer.register('terminater', store);
      composer.register('quota', store);
    },
  };

  return success(store);
}
