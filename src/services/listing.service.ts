/**
 * Listing Service
 *
 * Rebuilds the set of uploads from the sidecar files in the store
 * directory on every call. There is no index: each `<id>.info` entry is
 * resolved through the store, and a single unresolvable record fails the
 * whole listing rather than being left out.
 */

import { readdir } from 'fs/promises';

import type {
  DataStore,
  Result,
  UploadInfo,
  UploadInventory,
} from '../types/index.js';
import { INFO_SUFFIX, UPLOAD_ERROR, failure, success } from '../types/index.js';

/**
 * ListingService interface
 */
export interface ListingService extends UploadInventory {
  /** Uploads sorted by filename metadata */
  list(): Promise<Result<UploadInfo[]>>;
}

/**
 * Recover the upload id from a sidecar filename, or null for other entries
 */
export function idFromSidecarName(name: string): string | null {
  if (name.length <= INFO_SUFFIX.length || !name.endsWith(INFO_SUFFIX)) {
    return null;
  }
  return name.slice(0, -INFO_SUFFIX.length);
}

/**
 * Ascending by `metadata.filename` in UTF-8 byte order.
 * Uploads without a filename sort first.
 */
export function compareByFilename(a: UploadInfo, b: UploadInfo): number {
  return Buffer.compare(
    Buffer.from(a.metadata.filename ?? '', 'utf8'),
    Buffer.from(b.metadata.filename ?? '', 'utf8')
  );
}

/**
 * Create ListingService instance
 */
export function createListingService(deps: {
  dir: string;
  store: Pick<DataStore, 'getInfo'>;
}): ListingService {
  const { dir, store } = deps;

  async function collect(): Promise<Result<UploadInfo[]>> {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      return failure(
        UPLOAD_ERROR.IO_FAILURE,
        `Unable to read upload directory: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { dir }
      );
    }

    const uploads: UploadInfo[] = [];
    for (const name of names) {
      const id = idFromSidecarName(name);
      if (id === null) {
        continue;
      }

      const result = await store.getInfo(id);
      if (!result.success) {
        return failure(
          result.error.code,
          `Unable to resolve upload ${id}: ${result.error.message}`,
          { ...result.error.details, id }
        );
      }
      uploads.push(result.data);
    }

    return success(uploads);
  }

  return {
    collect,

    async list(): Promise<Result<UploadInfo[]>> {
      const result = await collect();
      if (!result.success) {
        return result;
      }
      // Array.prototype.sort is stable: equal filenames keep scan order
      return success([...result.data].sort(compareByFilename));
    },
  };
}
