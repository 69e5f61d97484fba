export {
  S3ObjectStore,
  toStorageError,
  DEFAULT_MULTIPART_THRESHOLD_BYTES,
  DEFAULT_PART_SIZE_BYTES,
} from './s3-object-store.js';
export { MemoryObjectStore } from './memory-object-store.js';
export { DIGEST_METADATA_KEY, CANNED_ACLS } from './types.js';

export type { S3ObjectStoreOptions } from './s3-object-store.js';
export type {
  MemoryObjectStoreOptions,
  StoredObject,
  StoreCall,
  StoreOperation,
} from './memory-object-store.js';
export type { ObjectStore, ObjectBody, HeadObjectResult, PutObjectOptions } from './types.js';
