/**
 * Error taxonomy for index publishing.
 *
 * Every failure surfaced to the CLI is one of these classes. None of them
 * are recovered from silently; the only automatic recovery is the bounded
 * retry of transient StorageErrors in the synchronizer.
 */

export type S3piErrorCode = 'CONFIGURATION' | 'NOT_FOUND' | 'STORAGE' | 'ABORTED';

export class S3piError extends Error {
  public readonly code: S3piErrorCode;

  constructor(code: S3piErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'S3piError';
    this.code = code;
  }
}

/** Bad or missing configuration. */
export class ConfigurationError extends S3piError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

/** A local path that does not exist or is not the expected kind. */
export class NotFoundError extends S3piError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

export interface StorageErrorDetails {
  /** HTTP status reported by the object store, when there was a response */
  statusCode?: number;
  /** Whether retrying the same request may succeed */
  transient: boolean;
  /** Object key the failing request addressed */
  key?: string;
  /** Number of attempts made before giving up */
  attempts?: number;
  cause?: unknown;
}

/** Network, auth or permission failure from the object store. */
export class StorageError extends S3piError {
  public readonly statusCode: number | undefined;
  public readonly transient: boolean;
  public readonly key: string | undefined;
  public readonly attempts: number;

  constructor(message: string, details: StorageErrorDetails) {
    super('STORAGE', message, { cause: details.cause });
    this.name = 'StorageError';
    this.statusCode = details.statusCode;
    this.transient = details.transient;
    this.key = details.key;
    this.attempts = details.attempts ?? 1;
  }

  /** Copy of this error recording the attempt count at the point it was given up on. */
  withAttempts(attempts: number): StorageError {
    return new StorageError(this.message, {
      statusCode: this.statusCode,
      transient: this.transient,
      key: this.key,
      attempts,
      cause: this.cause,
    });
  }
}

/** The run was interrupted before every object was published. */
export class SyncAbortedError extends S3piError {
  constructor(message = 'Synchronization aborted before completion') {
    super('ABORTED', message);
    this.name = 'SyncAbortedError';
  }
}

export function isS3piError(err: unknown): err is S3piError {
  return err instanceof S3piError;
}
