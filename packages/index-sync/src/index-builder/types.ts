/**
 * Types for the simple index builder.
 */

import type { Artifact } from '../scan/types.js';

/** One per-package page: every file published for a project */
export interface PackageIndexPage {
  packageName: string;
  /** Sorted by filename */
  artifacts: Artifact[];
}

/** The top-level page linking to every package page */
export interface RootIndexPage {
  /** Sorted alphabetically */
  packageNames: string[];
}

/** The whole index as computed from one directory scan */
export interface SimpleIndex {
  root: RootIndexPage;
  packages: PackageIndexPage[];
}

export type RemoteObjectKind = 'artifact' | 'package-index' | 'root-index';

/** Where the bytes of a remote object come from */
export type RemoteObjectSource =
  | { type: 'file'; path: string }
  | { type: 'inline'; content: string };

/** An object ready to be published under the configured prefix */
export interface RemoteObject {
  /** Full object key: prefix + relative path */
  key: string;
  /** Path relative to the prefix, e.g. foo/index.html */
  relativePath: string;
  kind: RemoteObjectKind;
  source: RemoteObjectSource;
  contentType: string;
  /** SHA-256 hex digest of the content */
  sha256: string;
  /** MD5 hex digest of the content */
  md5: string;
  sizeBytes: number;
}
