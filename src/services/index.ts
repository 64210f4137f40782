/**
 * Service Layer Exports
 */

export { createFileUploadStore } from './upload.store.js';
export type { FileUploadStore } from './upload.store.js';
export {
  createStoreComposer,
  StoreComposerError,
} from './store-composer.js';
export type { StoreComposer } from './store-composer.js';
export { createQuotaCounter } from './quota.counter.js';
export type { QuotaCounter } from './quota.counter.js';
export { createQuotaStore } from './quota.store.js';
export type { QuotaStore } from './quota.store.js';
export {
  createListingService,
  compareByFilename,
  idFromSidecarName,
} from './listing.service.js';
export type { ListingService } from './listing.service.js';
