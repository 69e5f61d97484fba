/**
 * Storage synchronizer.
 *
 * Reconciles the generated index against the bucket: every object is
 * checked first and written only when it is missing or its digest differs.
 * Artifacts go first (concurrently), then package pages, then the root
 * page, so a published page never links to a file that is not there yet.
 *
 * With upload disabled the pass is a dry run: existence checks only, no
 * writes.
 */

import type { Logger } from 'pino';
import type { IndexConfig } from '../config/types.js';
import { SyncAbortedError } from '../errors.js';
import type { RemoteObject, RemoteObjectKind } from '../index-builder/types.js';
import type { HeadObjectResult, ObjectBody, ObjectStore } from '../store/types.js';
import { DEFAULT_RETRY_POLICY, defaultSleep, withRetry } from './retry.js';
import type { RetryPolicy, Sleep } from './retry.js';
import type {
  IndexSynchronizerOptions,
  ObjectSyncResult,
  SyncAction,
  SyncOptions,
  SyncReport,
} from './types.js';

/** Publishing order; each phase starts only after the previous one succeeded */
const PHASES: readonly RemoteObjectKind[] = ['artifact', 'package-index', 'root-index'];

/**
 * Decide what to do with an object given what the store holds.
 *
 * The recorded sha256 digest is authoritative. Objects without one (not
 * uploaded by this tool) match when their ETag equals the content MD5.
 */
export function classifyObject(object: RemoteObject, remote: HeadObjectResult): SyncAction {
  if (!remote.exists) {
    return 'create';
  }
  if (remote.digest !== undefined) {
    return remote.digest === object.sha256 ? 'skip' : 'update';
  }
  if (remote.etag !== undefined && remote.etag === object.md5) {
    return 'skip';
  }
  return 'update';
}

function bodyOf(object: RemoteObject): ObjectBody {
  switch (object.source.type) {
    case 'inline':
      return { type: 'buffer', content: Buffer.from(object.source.content, 'utf-8') };
    case 'file':
      return { type: 'file', path: object.source.path, sizeBytes: object.sizeBytes };
  }
}

export class IndexSynchronizer {
  private readonly config: IndexConfig;
  private readonly store: ObjectStore;
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(
    config: IndexConfig,
    store: ObjectStore,
    logger: Logger,
    options: IndexSynchronizerOptions = {}
  ) {
    this.config = config;
    this.store = store;
    this.logger = logger.child({ component: 'index-synchronizer' });
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Publish (or, with upload disabled, plan) the given objects.
   *
   * @throws StorageError when the store fails, after retries for transient failures
   * @throws SyncAbortedError when options.signal fires mid-pass
   */
  async sync(objects: readonly RemoteObject[], options: SyncOptions = {}): Promise<SyncReport> {
    const dryRun = !this.config.upload;
    const { signal } = options;

    this.logger.info(
      {
        bucket: this.config.bucket,
        prefix: this.config.prefix,
        objects: objects.length,
        dryRun,
      },
      dryRun ? 'Planning index sync (dry run)' : 'Starting index sync'
    );

    const results: ObjectSyncResult[] = [];

    for (const kind of PHASES) {
      const phase = objects.filter((o) => o.kind === kind);
      if (phase.length === 0) continue;

      // Pages are few and small; only artifacts are worth running in parallel
      const concurrency = kind === 'artifact' ? this.config.concurrency : 1;
      const phaseResults = await this.runWithConcurrency(
        phase,
        concurrency,
        (object) => this.syncObject(object, dryRun, signal),
        signal
      );
      results.push(...phaseResults);
    }

    const report: SyncReport = {
      dryRun,
      bucket: this.config.bucket,
      prefix: this.config.prefix,
      results,
      created: results.filter((r) => r.action === 'create').length,
      updated: results.filter((r) => r.action === 'update').length,
      skipped: results.filter((r) => r.action === 'skip').length,
    };

    this.logger.info(
      {
        created: report.created,
        updated: report.updated,
        skipped: report.skipped,
        dryRun,
      },
      dryRun ? 'Index sync planned' : 'Index sync complete'
    );

    return report;
  }

  /**
   * Run a worker over items with at most `limit` in flight. After the first
   * failure (or an abort) no further items are started; in-flight work is
   * awaited and the first error is rethrown. An abort that arrives once
   * every item has been taken is not a failure.
   */
  private async runWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T) => Promise<R>,
    signal?: AbortSignal
  ): Promise<R[]> {
    const results: R[] = [];
    const queue = items.map((item, index) => ({ item, index }));
    const state: { failed: boolean; error: unknown } = { failed: false, error: undefined };

    const fail = (error: unknown): void => {
      if (!state.failed) {
        state.failed = true;
        state.error = error;
      }
    };

    const processNext = async (): Promise<void> => {
      while (!state.failed) {
        const next = queue.shift();
        if (!next) return;

        if (signal?.aborted) {
          fail(new SyncAbortedError());
          return;
        }

        try {
          results[next.index] = await worker(next.item);
        } catch (err) {
          fail(err);
          return;
        }
      }
    };

    const inflight: Promise<void>[] = [];
    const workers = Math.min(Math.max(1, limit), items.length);
    for (let i = 0; i < workers; i++) {
      inflight.push(processNext());
    }
    await Promise.all(inflight);

    if (state.failed) {
      throw state.error;
    }
    return results;
  }

  private async syncObject(
    object: RemoteObject,
    dryRun: boolean,
    signal?: AbortSignal
  ): Promise<ObjectSyncResult> {
    const { bucket } = this.config;
    const retryBase = {
      policy: this.retryPolicy,
      sleep: this.sleep,
      logger: this.logger,
      key: object.key,
      signal,
    };

    const head = await withRetry(() => this.store.headObject(bucket, object.key), {
      ...retryBase,
      operation: 'headObject',
    });
    const action = classifyObject(object, head.value);

    const result: ObjectSyncResult = {
      key: object.key,
      kind: object.kind,
      action,
      uploaded: false,
      headAttempts: head.attempts,
      putAttempts: 0,
      sizeBytes: object.sizeBytes,
    };

    if (action === 'skip') {
      this.logger.debug({ key: object.key }, 'Object unchanged, skipping');
      return result;
    }

    if (dryRun) {
      this.logger.info(
        { key: object.key, action, size: object.sizeBytes },
        action === 'create' ? 'Would create object' : 'Would update object'
      );
      return result;
    }

    const body = bodyOf(object);
    const put = await withRetry(
      () =>
        this.store.putObject(bucket, object.key, body, {
          contentType: object.contentType,
          digest: object.sha256,
          ...(this.config.acl !== undefined ? { acl: this.config.acl } : {}),
        }),
      { ...retryBase, operation: 'putObject' }
    );

    this.logger.info(
      { key: object.key, action, size: object.sizeBytes, attempts: put.attempts },
      action === 'create' ? 'Object created' : 'Object updated'
    );

    return { ...result, uploaded: true, putAttempts: put.attempts };
  }
}
