/**
 * Settings for one publishing run.
 *
 * Built once by the loader from the INI configuration file(s) and CLI
 * overrides, then passed explicitly to every component that needs it.
 */
export interface IndexConfig {
  /** S3 bucket holding the package index */
  bucket: string;
  /** Key prefix of the index: no leading slash, one trailing slash, or '' for the bucket root */
  prefix: string;
  /** When false the synchronizer only reports what it would do */
  upload: boolean;
  /** AWS region of the bucket */
  region: string;
  /** Canned ACL applied to every uploaded object (e.g. public-read) */
  acl?: string;
  /** Maximum concurrent artifact uploads */
  concurrency: number;
}

/** Values that may override what the configuration files say */
export type IndexConfigOverrides = Partial<Pick<IndexConfig, 'upload' | 'region'>>;

/** Default configuration values */
export const DEFAULT_INDEX_CONFIG: Omit<IndexConfig, 'bucket' | 'acl'> = {
  prefix: 'simple/',
  upload: true,
  region: 'us-east-1',
  concurrency: 4,
};

/** Section read from each configuration file */
export const DEFAULT_SECTION = 'default';

/** System-wide configuration file, read before the user's */
export const SYSTEM_CONFIG_PATH = '/etc/s3pi/config';

/** Keys recognised in the configuration section */
export const CONFIG_KEYS = {
  bucket: 's3.bucket',
  prefix: 's3.prefix',
  region: 's3.region',
  acl: 's3.acl',
  upload: 'upload',
  concurrency: 'concurrency',
} as const;
