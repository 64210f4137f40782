/**
 * Quota Counter
 *
 * Running total of bytes reserved by uploads, shared by every request that
 * goes through the quota store. Every mutation is synchronous: the check
 * and the update of a reservation run without yielding to the event loop,
 * so no two reservations can interleave.
 */

import type { QuotaUsage } from '../types/index.js';

/**
 * QuotaCounter interface
 */
export interface QuotaCounter {
  readonly ceiling: number;
  /**
   * Reserve `bytes` if they fit into the remaining capacity.
   * Returns false and changes nothing otherwise.
   */
  tryReserve(bytes: number): boolean;
  /** Return previously reserved bytes */
  release(bytes: number): void;
  /** Replace the total, used once when seeding from disk */
  reset(usedBytes: number): void;
  usage(): QuotaUsage;
}

function assertByteCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(
      `${name} must be a non-negative integer, got ${value}`
    );
  }
}

/**
 * Create a QuotaCounter for a positive ceiling.
 * A non-positive ceiling means the quota is disabled and no counter exists.
 */
export function createQuotaCounter(ceiling: number): QuotaCounter {
  if (!Number.isSafeInteger(ceiling) || ceiling <= 0) {
    throw new RangeError(
      `Quota ceiling must be a positive integer, got ${ceiling}`
    );
  }

  let usedBytes = 0;

  return {
    ceiling,

    tryReserve(bytes) {
      assertByteCount('Reserved bytes', bytes);
      if (bytes > ceiling - usedBytes) {
        return false;
      }
      usedBytes += bytes;
      return true;
    },

    release(bytes) {
      assertByteCount('Released bytes', bytes);
      usedBytes = Math.max(0, usedBytes - bytes);
    },

    reset(total) {
      assertByteCount('Used bytes', total);
      usedBytes = total;
    },

    usage() {
      return {
        usedBytes,
        ceiling,
        remaining: Math.max(0, ceiling - usedBytes),
      };
    },
  };
}
