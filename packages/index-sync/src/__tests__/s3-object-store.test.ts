import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import pino from 'pino';
import { S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { S3ObjectStore, toStorageError } from '../store/s3-object-store.js';
import { StorageError } from '../errors.js';

const { mockSend, mockDone } = vi.hoisted(() => ({ mockSend: vi.fn(), mockDone: vi.fn() }));

// Real commands and exceptions; only the client is replaced
vi.mock('@aws-sdk/client-s3', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@aws-sdk/client-s3')>();
  return {
    ...actual,
    S3Client: vi.fn().mockImplementation(() => ({
      send: mockSend,
    })),
  };
});

vi.mock('@aws-sdk/lib-storage', () => ({
  Upload: vi.fn().mockImplementation(() => ({
    done: mockDone,
  })),
}));

const logger = pino({ level: 'silent' });

function serviceError(name: string, httpStatusCode: number, message: string): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: httpStatusCode >= 500 ? 'server' : 'client',
    $metadata: { httpStatusCode },
    message,
  });
}

describe('S3ObjectStore', () => {
  let store: S3ObjectStore;

  beforeEach(() => {
    mockSend.mockReset();
    mockDone.mockReset();
    vi.mocked(Upload).mockClear();
    store = new S3ObjectStore({ region: 'eu-west-1' }, logger);
  });

  it('should create a client for the region with SDK retries disabled', () => {
    expect(vi.mocked(S3Client)).toHaveBeenLastCalledWith({ region: 'eu-west-1', maxAttempts: 1 });
  });

  describe('headObject', () => {
    it('should report a missing object as not existing', async () => {
      mockSend.mockRejectedValueOnce(serviceError('NotFound', 404, 'Not Found'));

      await expect(store.headObject('test-bucket', 'simple/index.html')).resolves.toEqual({
        exists: false,
      });
    });

    it('should return the recorded digest and the unquoted etag', async () => {
      mockSend.mockResolvedValueOnce({
        Metadata: { 'content-hash': 'a'.repeat(64) },
        ETag: `"${'b'.repeat(32)}"`,
      });

      const result = await store.headObject('test-bucket', 'simple/index.html');

      expect(result).toEqual({ exists: true, digest: 'a'.repeat(64), etag: 'b'.repeat(32) });
      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({ input: { Bucket: 'test-bucket', Key: 'simple/index.html' } })
      );
    });

    it('should omit the digest for objects without metadata', async () => {
      mockSend.mockResolvedValueOnce({ ETag: '"abc"' });

      await expect(store.headObject('test-bucket', 'simple/index.html')).resolves.toEqual({
        exists: true,
        etag: 'abc',
      });
    });

    it('should fail without retry hints on a permission error', async () => {
      mockSend.mockRejectedValueOnce(serviceError('Forbidden', 403, 'Forbidden'));

      const error = await store.headObject('test-bucket', 'simple/index.html').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({
        message: 'Forbidden (HTTP 403): Forbidden',
        statusCode: 403,
        transient: false,
        key: 'simple/index.html',
      });
    });
  });

  describe('putObject', () => {
    it('should send the body with content type, digest metadata and ACL', async () => {
      mockSend.mockResolvedValueOnce({});
      const body = Buffer.from('bar wheel');

      await store.putObject('test-bucket', 'simple/bar/bar-2.0.whl', { type: 'buffer', content: body }, {
        contentType: 'application/zip',
        digest: 'a'.repeat(64),
        acl: 'public-read',
      });

      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({
          input: {
            Bucket: 'test-bucket',
            Key: 'simple/bar/bar-2.0.whl',
            Body: body,
            ContentType: 'application/zip',
            Metadata: { 'content-hash': 'a'.repeat(64), 'hash-algorithm': 'sha256' },
            ACL: 'public-read',
          },
        })
      );
    });

    it('should leave out the ACL when none is configured', async () => {
      mockSend.mockResolvedValueOnce({});

      await store.putObject('test-bucket', 'simple/index.html', { type: 'buffer', content: Buffer.from('page') }, {
        contentType: 'text/html; charset=utf-8',
        digest: 'a'.repeat(64),
      });

      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({ input: expect.not.objectContaining({ ACL: expect.anything() }) })
      );
    });

    it('should reject an unsupported ACL before sending', async () => {
      const error = await store
        .putObject('test-bucket', 'simple/index.html', { type: 'buffer', content: Buffer.from('page') }, {
          contentType: 'text/html; charset=utf-8',
          digest: 'a'.repeat(64),
          acl: 'world-writable',
        })
        .catch((err: unknown) => err);

      expect(error).toMatchObject({ message: 'Unsupported canned ACL: world-writable', transient: false });
      expect(mockSend).not.toHaveBeenCalled();
    });

    it('should mark service unavailability as transient', async () => {
      mockSend.mockRejectedValueOnce(serviceError('ServiceUnavailable', 503, 'Please reduce your request rate.'));

      const error = await store
        .putObject('test-bucket', 'simple/index.html', { type: 'buffer', content: Buffer.from('page') }, {
          contentType: 'text/html; charset=utf-8',
          digest: 'a'.repeat(64),
        })
        .catch((err: unknown) => err);

      expect(error).toMatchObject({ statusCode: 503, transient: true });
    });
  });

  describe('putObject with file bodies', () => {
    let tmpDir: string;
    let filePath: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 's3pi-s3-store-test-'));
      filePath = path.join(tmpDir, 'bar-2.0.whl');
      fs.writeFileSync(filePath, 'bar wheel');
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should send small files in a single request', async () => {
      mockSend.mockResolvedValueOnce({});

      await store.putObject('test-bucket', 'simple/bar/bar-2.0.whl', { type: 'file', path: filePath, sizeBytes: 9 }, {
        contentType: 'application/zip',
        digest: 'a'.repeat(64),
      });

      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({
          input: expect.objectContaining({ Key: 'simple/bar/bar-2.0.whl', Body: Buffer.from('bar wheel') }),
        })
      );
      expect(vi.mocked(Upload)).not.toHaveBeenCalled();
    });

    it('should stream files above the threshold as a multipart upload with the digest metadata', async () => {
      mockDone.mockResolvedValueOnce({});
      const multipartStore = new S3ObjectStore(
        { region: 'eu-west-1', multipartThresholdBytes: 4, partSizeBytes: 5 * 1024 * 1024 },
        logger
      );

      await multipartStore.putObject(
        'test-bucket',
        'simple/bar/bar-2.0.whl',
        { type: 'file', path: filePath, sizeBytes: 9 },
        { contentType: 'application/zip', digest: 'a'.repeat(64), acl: 'public-read' }
      );

      expect(mockSend).not.toHaveBeenCalled();
      expect(mockDone).toHaveBeenCalledTimes(1);
      expect(vi.mocked(Upload)).toHaveBeenCalledWith(
        expect.objectContaining({
          partSize: 5 * 1024 * 1024,
          leavePartsOnError: false,
          params: expect.objectContaining({
            Bucket: 'test-bucket',
            Key: 'simple/bar/bar-2.0.whl',
            ContentType: 'application/zip',
            Metadata: { 'content-hash': 'a'.repeat(64), 'hash-algorithm': 'sha256' },
            ACL: 'public-read',
          }),
        })
      );
      const uploadBody = vi.mocked(Upload).mock.calls[0]?.[0].params.Body;
      expect(uploadBody).toBeInstanceOf(Readable);
    });

    it('should map multipart failures to storage errors', async () => {
      mockDone.mockRejectedValueOnce(serviceError('InternalError', 500, 'We encountered an internal error.'));
      const multipartStore = new S3ObjectStore({ region: 'eu-west-1', multipartThresholdBytes: 4 }, logger);

      const error = await multipartStore
        .putObject('test-bucket', 'simple/bar/bar-2.0.whl', { type: 'file', path: filePath, sizeBytes: 9 }, {
          contentType: 'application/zip',
          digest: 'a'.repeat(64),
        })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({
        message: 'InternalError (HTTP 500): We encountered an internal error.',
        statusCode: 500,
        transient: true,
        key: 'simple/bar/bar-2.0.whl',
      });
    });

    it('should report an unreadable file without retry hints', async () => {
      const missing = path.join(tmpDir, 'gone-1.0.whl');

      const error = await store
        .putObject('test-bucket', 'simple/gone/gone-1.0.whl', { type: 'file', path: missing, sizeBytes: 9 }, {
          contentType: 'application/zip',
          digest: 'a'.repeat(64),
        })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({ transient: false, key: 'simple/gone/gone-1.0.whl' });
      expect(mockSend).not.toHaveBeenCalled();
    });
  });
});

describe('toStorageError', () => {
  it('should treat throttling as transient', () => {
    const error = toStorageError(serviceError('SlowDown', 400, 'Slow down'), 'k');

    expect(error.transient).toBe(true);
    expect(error.message).toBe('SlowDown (HTTP 400): Slow down');
  });

  it('should treat 429 as transient', () => {
    expect(toStorageError(serviceError('TooManyRequests', 429, 'busy'), 'k').transient).toBe(true);
  });

  it('should treat client timeouts as transient', () => {
    const timeout = new Error('socket timed out');
    timeout.name = 'TimeoutError';

    const error = toStorageError(timeout, 'k');

    expect(error).toMatchObject({
      message: 'TimeoutError: socket timed out',
      statusCode: undefined,
      transient: true,
    });
  });

  it('should treat connection resets as transient', () => {
    const reset = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });

    expect(toStorageError(reset, 'k').transient).toBe(true);
  });

  it('should treat a missing bucket as permanent', () => {
    const error = toStorageError(serviceError('NoSuchBucket', 404, 'The specified bucket does not exist'), 'k');

    expect(error).toMatchObject({ statusCode: 404, transient: false, key: 'k' });
  });

  it('should return storage errors unchanged', () => {
    const original = new StorageError('already mapped', { transient: true });

    expect(toStorageError(original, 'k')).toBe(original);
  });
});
