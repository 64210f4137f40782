/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type {
  UploadInfo,
  UploadMetadata,
  CreateUploadParams,
  UploadContent,
  UploadErrorCode,
} from './upload.js';
export {
  INFO_SUFFIX,
  UPLOAD_ID_PATTERN,
  UPLOAD_ERROR,
  uploadInfoSchema,
} from './upload.js';
export type {
  DataStore,
  Terminater,
  QuotaUsage,
  QuotaAware,
  UploadInventory,
  CapabilityMap,
  Capability,
} from './store.js';
export type { ListenerTransport, ListenerConfig } from './listener.js';
export { LISTENER_ERROR } from './listener.js';
