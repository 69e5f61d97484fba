/**
 * In-process ObjectStore.
 *
 * Keeps objects in a Map and records every call, with support for:
 * - Pre-seeding objects (with or without a recorded digest)
 * - Queued failures per operation, consumed one per call
 * - A fixed set of buckets, unknown buckets failing like a missing bucket
 *
 * File bodies are kept by reference and never read on upload, so they carry
 * no ETag (as with a multipart upload) and only the recorded digest
 * identifies them.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import { StorageError } from '../errors.js';
import type { HeadObjectResult, ObjectBody, ObjectStore, PutObjectOptions } from './types.js';

export type StoreOperation = 'head' | 'put';

/** An object held by the store */
export interface StoredObject {
  body: ObjectBody;
  contentType: string;
  digest?: string;
  etag?: string;
  acl?: string;
}

/** A call made against the store, in order */
export interface StoreCall {
  operation: StoreOperation;
  bucket: string;
  key: string;
}

export interface MemoryObjectStoreOptions {
  /** Buckets that exist; when omitted every bucket exists */
  buckets?: string[];
}

export class MemoryObjectStore implements ObjectStore {
  readonly calls: StoreCall[] = [];
  private readonly objects = new Map<string, StoredObject>();
  private readonly failures: Record<StoreOperation, Error[]> = { head: [], put: [] };
  private readonly buckets: Set<string> | null;

  constructor(options: MemoryObjectStoreOptions = {}) {
    this.buckets = options.buckets ? new Set(options.buckets) : null;
  }

  /** Make the next calls of an operation fail with the given errors, in order. */
  failNext(operation: StoreOperation, ...errors: Error[]): void {
    this.failures[operation].push(...errors);
  }

  /** Place an object in the store without recording a call. */
  seed(bucket: string, key: string, body: Buffer | string, digest?: string): void {
    const buffer = typeof body === 'string' ? Buffer.from(body, 'utf-8') : body;
    this.objects.set(this.objectId(bucket, key), {
      body: { type: 'buffer', content: buffer },
      contentType: 'application/octet-stream',
      etag: crypto.createHash('md5').update(buffer).digest('hex'),
      ...(digest !== undefined ? { digest } : {}),
    });
  }

  getObject(bucket: string, key: string): StoredObject | undefined {
    return this.objects.get(this.objectId(bucket, key));
  }

  /** Content of a stored object as text, reading file bodies from disk. */
  async readText(bucket: string, key: string): Promise<string | undefined> {
    const stored = this.objects.get(this.objectId(bucket, key));
    if (!stored) {
      return undefined;
    }
    return stored.body.type === 'buffer'
      ? stored.body.content.toString('utf-8')
      : fs.readFile(stored.body.path, 'utf-8');
  }

  /** Keys stored in a bucket, sorted. */
  keys(bucket: string): string[] {
    const prefix = `${bucket}/`;
    return [...this.objects.keys()]
      .filter((id) => id.startsWith(prefix))
      .map((id) => id.slice(prefix.length))
      .sort();
  }

  callsFor(operation: StoreOperation, key?: string): StoreCall[] {
    return this.calls.filter((c) => c.operation === operation && (key === undefined || c.key === key));
  }

  async headObject(bucket: string, key: string): Promise<HeadObjectResult> {
    this.record('head', bucket, key);

    const stored = this.objects.get(this.objectId(bucket, key));
    if (!stored) {
      return { exists: false };
    }
    return {
      exists: true,
      ...(stored.etag !== undefined ? { etag: stored.etag } : {}),
      ...(stored.digest !== undefined ? { digest: stored.digest } : {}),
    };
  }

  async putObject(bucket: string, key: string, body: ObjectBody, options: PutObjectOptions): Promise<void> {
    this.record('put', bucket, key);

    this.objects.set(this.objectId(bucket, key), {
      body: body.type === 'buffer' ? { type: 'buffer', content: Buffer.from(body.content) } : { ...body },
      contentType: options.contentType,
      digest: options.digest,
      ...(body.type === 'buffer'
        ? { etag: crypto.createHash('md5').update(body.content).digest('hex') }
        : {}),
      ...(options.acl !== undefined ? { acl: options.acl } : {}),
    });
  }

  private record(operation: StoreOperation, bucket: string, key: string): void {
    this.calls.push({ operation, bucket, key });

    const failure = this.failures[operation].shift();
    if (failure) {
      throw failure;
    }

    if (this.buckets && !this.buckets.has(bucket)) {
      throw new StorageError(`The specified bucket does not exist: ${bucket}`, {
        statusCode: 404,
        transient: false,
        key,
      });
    }
  }

  private objectId(bucket: string, key: string): string {
    return `${bucket}/${key}`;
  }
}
