/**
 * Store Capability Types
 *
 * A backend implements one or more of these narrow contracts and registers
 * each with the store composer. The upload routes ask the composer for the
 * capability they need at request time.
 */

import type { Result } from './result.js';
import type {
  CreateUploadParams,
  UploadContent,
  UploadInfo,
} from './upload.js';

/**
 * Byte and metadata persistence
 */
export interface DataStore {
  create(params: CreateUploadParams): Promise<Result<UploadInfo>>;
  writeChunk(
    id: string,
    offset: number,
    chunks: AsyncIterable<Uint8Array>
  ): Promise<Result<number>>;
  getInfo(id: string): Promise<Result<UploadInfo>>;
  read(id: string): Promise<Result<UploadContent>>;
}

/**
 * Deletion and reclamation of an upload
 */
export interface Terminater {
  terminate(id: string): Promise<Result<void>>;
}

/**
 * Snapshot of quota accounting
 */
export interface QuotaUsage {
  usedBytes: number;
  ceiling: number;
  remaining: number;
}

/**
 * Exposes usable-space accounting
 */
export interface QuotaAware {
  usage(): QuotaUsage;
}

/**
 * Source of every upload currently on disk, in scan order
 */
export interface UploadInventory {
  collect(): Promise<Result<UploadInfo[]>>;
}

/**
 * Capability name to contract
 */
export interface CapabilityMap {
  core: DataStore;
  terminater: Terminater;
  quota: QuotaAware;
}

export type Capability = keyof CapabilityMap;
