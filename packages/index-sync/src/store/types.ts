/**
 * The object-store capability the synchronizer is written against.
 *
 * Any backend that can report an object's digest and store a body under a
 * key can host the index. Implementations map their own failures to
 * StorageError, marking which ones are worth retrying.
 */

/** What is known about an existing object */
export interface HeadObjectResult {
  exists: boolean;
  /** SHA-256 hex digest recorded when the object was uploaded by this tool */
  digest?: string;
  /** Entity tag without quotes (an MD5 hex digest for single-part uploads) */
  etag?: string;
}

/**
 * Content to store. Files are passed by reference so a store can stream
 * them instead of holding the whole body in memory.
 */
export type ObjectBody =
  | { type: 'buffer'; content: Buffer }
  | { type: 'file'; path: string; sizeBytes: number };

export interface PutObjectOptions {
  contentType: string;
  /** SHA-256 hex digest of the body, stored with the object */
  digest: string;
  /** Canned ACL, for backends that support one */
  acl?: string;
}

export interface ObjectStore {
  /**
   * Look up an object.
   * A missing object is `{ exists: false }`, not an error.
   */
  headObject(bucket: string, key: string): Promise<HeadObjectResult>;

  putObject(bucket: string, key: string, body: ObjectBody, options: PutObjectOptions): Promise<void>;
}

/** Metadata key holding the content digest on uploaded objects */
export const DIGEST_METADATA_KEY = 'content-hash';

/** Canned ACLs accepted by s3.acl */
export const CANNED_ACLS: readonly string[] = [
  'private',
  'public-read',
  'public-read-write',
  'authenticated-read',
  'aws-exec-read',
  'bucket-owner-read',
  'bucket-owner-full-control',
];
