/**
 * Types for the artifact scanner.
 */

/** Kind of distribution file, decided by filename suffix */
export type DistributionFormat = 'wheel' | 'sdist' | 'egg';

/** A recognised filename suffix and the format it denotes */
export interface DistributionSuffix {
  suffix: string;
  format: DistributionFormat;
  contentType: string;
}

/** A distribution file found in the scanned directory */
export interface Artifact {
  /** Base filename, e.g. foo-1.0-py3-none-any.whl */
  filename: string;
  /** PEP 503 normalized project name */
  packageName: string;
  /** Absolute path of the local file */
  localPath: string;
  format: DistributionFormat;
  /** MIME type used when uploading the file */
  contentType: string;
  /** SHA-256 hex digest of the file content */
  sha256: string;
  /** MD5 hex digest of the file content */
  md5: string;
  sizeBytes: number;
}
