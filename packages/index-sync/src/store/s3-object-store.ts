/**
 * ObjectStore backed by Amazon S3 (AWS SDK v3).
 *
 * Credentials come from the SDK's default provider chain. The SDK's own
 * retries are disabled (maxAttempts: 1) so the synchronizer's bounded
 * retry policy is the only one in effect.
 *
 * Files above the multipart threshold are streamed from disk through
 * @aws-sdk/lib-storage. Their ETag is then not an MD5 of the content, so
 * the content-hash metadata is what later runs compare against.
 */

import * as fs from 'node:fs';
import {
  S3Client,
  HeadObjectCommand,
  PutObjectCommand,
  S3ServiceException,
  ObjectCannedACL,
} from '@aws-sdk/client-s3';
import type { PutObjectCommandInput } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import type { Logger } from 'pino';
import { StorageError } from '../errors.js';
import type { HeadObjectResult, ObjectBody, ObjectStore, PutObjectOptions } from './types.js';
import { DIGEST_METADATA_KEY } from './types.js';

/** Files larger than this are uploaded in parts (64 MiB) */
export const DEFAULT_MULTIPART_THRESHOLD_BYTES = 64 * 1024 * 1024;

/** Part size for multipart uploads (16 MiB; S3's minimum is 5 MiB) */
export const DEFAULT_PART_SIZE_BYTES = 16 * 1024 * 1024;

export interface S3ObjectStoreOptions {
  /** AWS region of the bucket */
  region: string;
  /** File size above which uploads are multipart (default: 64 MiB) */
  multipartThresholdBytes?: number;
  /** Part size for multipart uploads (default: 16 MiB) */
  partSizeBytes?: number;
}

/** Error names the SDK and the S3 service use for conditions worth retrying */
const TRANSIENT_ERROR_NAMES = new Set([
  'TimeoutError',
  'RequestTimeout',
  'RequestTimeoutException',
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'InternalError',
  'ServiceUnavailable',
  'NetworkingError',
]);

/** Node socket error codes worth retrying */
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
]);

const CANNED_ACL_VALUES: ReadonlySet<string> = new Set(Object.values(ObjectCannedACL));

function isCannedAcl(value: string): value is ObjectCannedACL {
  return CANNED_ACL_VALUES.has(value);
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function httpStatusOf(err: unknown): number | undefined {
  if (err instanceof S3ServiceException) {
    return err.$metadata.httpStatusCode;
  }
  return undefined;
}

/**
 * Map an AWS SDK (or socket) error to a StorageError.
 *
 * Transient: HTTP 5xx, 429, timeouts, throttling and connection resets.
 * Everything else (403, 404 bucket, other 4xx) is not retried.
 */
export function toStorageError(err: unknown, key: string): StorageError {
  if (err instanceof StorageError) {
    return err;
  }

  const statusCode = httpStatusOf(err);
  const name = err instanceof Error ? err.name : 'UnknownError';
  const message = err instanceof Error ? err.message : String(err);
  const code = errorCode(err);

  const transient =
    (statusCode !== undefined && (statusCode >= 500 || statusCode === 429)) ||
    TRANSIENT_ERROR_NAMES.has(name) ||
    (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) ||
    (err instanceof S3ServiceException && err.$retryable !== undefined);

  const status = statusCode !== undefined ? ` (HTTP ${statusCode})` : '';
  return new StorageError(`${name}${status}: ${message || 'request failed'}`, {
    statusCode,
    transient,
    key,
    cause: err,
  });
}

function stripQuotes(etag: string): string {
  return etag.replace(/^"+|"+$/g, '');
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly logger: Logger;
  private readonly multipartThresholdBytes: number;
  private readonly partSizeBytes: number;

  constructor(options: S3ObjectStoreOptions, logger: Logger) {
    this.logger = logger.child({ component: 's3-object-store' });
    this.multipartThresholdBytes = options.multipartThresholdBytes ?? DEFAULT_MULTIPART_THRESHOLD_BYTES;
    this.partSizeBytes = options.partSizeBytes ?? DEFAULT_PART_SIZE_BYTES;
    this.client = new S3Client({
      region: options.region,
      maxAttempts: 1,
    });
  }

  async headObject(bucket: string, key: string): Promise<HeadObjectResult> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({
          Bucket: bucket,
          Key: key,
        })
      );

      const digest = response.Metadata?.[DIGEST_METADATA_KEY];
      const result: HeadObjectResult = { exists: true };
      if (digest) result.digest = digest;
      if (response.ETag) result.etag = stripQuotes(response.ETag);

      this.logger.debug({ bucket, key, ...result }, 'Object found');
      return result;
    } catch (err) {
      // HEAD responses carry no body, so a missing key surfaces as a bare 404
      if (httpStatusOf(err) === 404 || (err instanceof Error && err.name === 'NotFound')) {
        this.logger.debug({ bucket, key }, 'Object not found');
        return { exists: false };
      }
      throw toStorageError(err, key);
    }
  }

  async putObject(
    bucket: string,
    key: string,
    body: ObjectBody,
    options: PutObjectOptions
  ): Promise<void> {
    const acl = options.acl;
    if (acl !== undefined && !isCannedAcl(acl)) {
      throw new StorageError(`Unsupported canned ACL: ${acl}`, { transient: false, key });
    }

    const params: PutObjectCommandInput = {
      Bucket: bucket,
      Key: key,
      ContentType: options.contentType,
      Metadata: {
        [DIGEST_METADATA_KEY]: options.digest,
        'hash-algorithm': 'sha256',
      },
      ...(acl !== undefined ? { ACL: acl } : {}),
    };

    try {
      if (body.type === 'file' && body.sizeBytes > this.multipartThresholdBytes) {
        await this.multipartUpload(params, body.path);
      } else {
        const content = body.type === 'buffer' ? body.content : await fs.promises.readFile(body.path);
        await this.client.send(new PutObjectCommand({ ...params, Body: content }));
      }
    } catch (err) {
      throw toStorageError(err, key);
    }

    const size = body.type === 'buffer' ? body.content.length : body.sizeBytes;
    this.logger.debug({ bucket, key, size }, 'Object stored');
  }

  /**
   * Multipart upload streamed from disk. Each call opens a fresh stream, so
   * a retried upload starts over from the first byte.
   */
  private async multipartUpload(params: PutObjectCommandInput, filePath: string): Promise<void> {
    const stream = fs.createReadStream(filePath);

    const upload = new Upload({
      client: this.client,
      params: { ...params, Body: stream },
      queueSize: 4,
      partSize: this.partSizeBytes,
      leavePartsOnError: false,
    });

    try {
      await upload.done();
    } finally {
      stream.destroy();
    }

    this.logger.debug({ key: params.Key }, 'Multipart upload complete');
  }
}
