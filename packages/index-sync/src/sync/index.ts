export { IndexSynchronizer, classifyObject } from './synchronizer.js';
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY } from './retry.js';
export { hashFile, hashBuffer } from './file-hasher.js';
export { writeIndexToDirectory } from './local-mirror.js';

export type { RetryPolicy, Sleep } from './retry.js';
export type { ContentDigest } from './file-hasher.js';
export type {
  SyncAction,
  ObjectSyncResult,
  SyncReport,
  SyncOptions,
  IndexSynchronizerOptions,
} from './types.js';
