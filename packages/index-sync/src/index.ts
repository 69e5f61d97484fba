/**
 * Builds a PEP 503 simple package index from a directory of Python
 * distributions and publishes it to an S3 bucket.
 */

// Errors
export {
  S3piError,
  ConfigurationError,
  NotFoundError,
  StorageError,
  SyncAbortedError,
  isS3piError,
} from './errors.js';

export type { S3piErrorCode, StorageErrorDetails } from './errors.js';

// Logging
export { createLogger } from './logger.js';
export type { CreateLoggerOptions } from './logger.js';

// Configuration
export {
  loadConfig,
  buildIndexConfig,
  validateIndexConfig,
  readConfigSection,
  normalizePrefix,
  parseBoolean,
  defaultUserConfigPath,
  DEFAULT_INDEX_CONFIG,
  DEFAULT_SECTION,
  SYSTEM_CONFIG_PATH,
  CONFIG_KEYS,
} from './config/index.js';

export type { IndexConfig, IndexConfigOverrides, LoadConfigOptions } from './config/index.js';

// Artifact scanning
export {
  scanArtifacts,
  normalizePackageName,
  parseProjectName,
  DISTRIBUTION_SUFFIXES,
  matchDistribution,
} from './scan/index.js';

export type {
  Artifact,
  DistributionFormat,
  DistributionSuffix,
  MatchedDistribution,
} from './scan/index.js';

// Index building
export {
  buildIndex,
  buildRemoteObjects,
  renderRootIndex,
  renderPackageIndex,
  escapeHtml,
  INDEX_FILENAME,
  INDEX_CONTENT_TYPE,
} from './index-builder/index.js';

export type {
  PackageIndexPage,
  RootIndexPage,
  SimpleIndex,
  RemoteObject,
  RemoteObjectKind,
  RemoteObjectSource,
} from './index-builder/index.js';

// Object stores
export {
  S3ObjectStore,
  MemoryObjectStore,
  DEFAULT_MULTIPART_THRESHOLD_BYTES,
  DEFAULT_PART_SIZE_BYTES,
  toStorageError,
  DIGEST_METADATA_KEY,
  CANNED_ACLS,
} from './store/index.js';

export type {
  ObjectStore,
  ObjectBody,
  HeadObjectResult,
  PutObjectOptions,
  S3ObjectStoreOptions,
  MemoryObjectStoreOptions,
  StoredObject,
  StoreCall,
  StoreOperation,
} from './store/index.js';

// Synchronization
export {
  IndexSynchronizer,
  classifyObject,
  withRetry,
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  hashFile,
  hashBuffer,
  writeIndexToDirectory,
} from './sync/index.js';

export type {
  RetryPolicy,
  Sleep,
  ContentDigest,
  SyncAction,
  ObjectSyncResult,
  SyncReport,
  SyncOptions,
  IndexSynchronizerOptions,
} from './sync/index.js';
