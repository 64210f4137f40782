/**
 * Upload Domain Types
 *
 * An upload is one file transfer, complete or in progress. Its bytes live
 * in `<dir>/<id>` and its sidecar record in `<dir>/<id>.info`.
 */

import type { Readable } from 'node:stream';

import { z } from 'zod';

/**
 * Sidecar filename suffix. Listing and lookup both depend on it.
 */
export const INFO_SUFFIX = '.info';

/**
 * Upload ids are nanoid strings
 */
export const UPLOAD_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Persisted sidecar record
 */
export const uploadInfoSchema = z
  .object({
    id: z.string().regex(UPLOAD_ID_PATTERN),
    size: z.number().int().nonnegative(),
    offset: z.number().int().nonnegative(),
    metadata: z.record(z.string()),
    createdAt: z.string(),
  })
  .refine((info) => info.offset <= info.size, {
    message: 'offset must not exceed size',
    path: ['offset'],
  });

export type UploadInfo = z.infer<typeof uploadInfoSchema>;

/**
 * Key-value metadata supplied at creation (e.g. filename)
 */
export type UploadMetadata = Record<string, string>;

/**
 * Parameters for creating an upload
 */
export interface CreateUploadParams {
  size: number;
  metadata: UploadMetadata;
}

/**
 * Committed bytes of an upload, for download
 */
export interface UploadContent {
  info: UploadInfo;
  stream: Readable;
}

/**
 * Error codes produced by the upload stores
 */
export const UPLOAD_ERROR = {
  NOT_FOUND: 'NOT_FOUND',
  OFFSET_MISMATCH: 'OFFSET_MISMATCH',
  UPLOAD_LOCKED: 'UPLOAD_LOCKED',
  SIZE_EXCEEDED: 'SIZE_EXCEEDED',
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
  CORRUPT: 'CORRUPT',
  IO_FAILURE: 'IO_FAILURE',
} as const;

export type UploadErrorCode = (typeof UPLOAD_ERROR)[keyof typeof UPLOAD_ERROR];
