/**
 * Types for the storage synchronizer.
 */

import type { RemoteObjectKind } from '../index-builder/types.js';
import type { RetryPolicy, Sleep } from './retry.js';

/** What the synchronizer does (or would do) with one object */
export type SyncAction = 'create' | 'update' | 'skip';

/** Outcome for a single object */
export interface ObjectSyncResult {
  key: string;
  kind: RemoteObjectKind;
  action: SyncAction;
  /** Whether a write was issued and succeeded */
  uploaded: boolean;
  /** Attempts spent on the existence check */
  headAttempts: number;
  /** Attempts spent on the write (0 when nothing was written) */
  putAttempts: number;
  sizeBytes: number;
}

/** Summary of one synchronization pass */
export interface SyncReport {
  /** True when upload was disabled and nothing was written */
  dryRun: boolean;
  bucket: string;
  prefix: string;
  /** Per-object results: artifacts, then package pages, then the root page */
  results: ObjectSyncResult[];
  created: number;
  updated: number;
  skipped: number;
}

export interface SyncOptions {
  /** Stops new requests from being issued; the pass then fails with SyncAbortedError */
  signal?: AbortSignal;
}

export interface IndexSynchronizerOptions {
  retryPolicy?: RetryPolicy;
  /** Delay function used between retries */
  sleep?: Sleep;
}
