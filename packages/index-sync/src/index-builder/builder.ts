/**
 * Simple index builder.
 *
 * Groups artifacts by normalized package name and materializes the index
 * as RemoteObjects under the configured prefix:
 *
 *   {prefix}{name}/{filename}   artifact
 *   {prefix}{name}/index.html   package page
 *   {prefix}index.html          root page
 */

import type { IndexConfig } from '../config/types.js';
import type { Artifact } from '../scan/types.js';
import { hashBuffer } from '../sync/file-hasher.js';
import { renderPackageIndex, renderRootIndex } from './html.js';
import type { PackageIndexPage, RemoteObject, SimpleIndex } from './types.js';

export const INDEX_FILENAME = 'index.html';
export const INDEX_CONTENT_TYPE = 'text/html; charset=utf-8';

/** Code-unit order, independent of the host locale. */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Group artifacts into package pages, sorted by name and then filename. */
export function buildIndex(artifacts: readonly Artifact[]): SimpleIndex {
  const groups = new Map<string, Artifact[]>();

  for (const artifact of artifacts) {
    const group = groups.get(artifact.packageName);
    if (group) {
      group.push(artifact);
    } else {
      groups.set(artifact.packageName, [artifact]);
    }
  }

  const packageNames = [...groups.keys()].sort(compareStrings);
  const packages: PackageIndexPage[] = packageNames.map((packageName) => ({
    packageName,
    artifacts: [...(groups.get(packageName) ?? [])].sort((a, b) =>
      compareStrings(a.filename, b.filename)
    ),
  }));

  return { root: { packageNames }, packages };
}

function inlinePage(prefix: string, relativePath: string, kind: RemoteObject['kind'], html: string): RemoteObject {
  const digest = hashBuffer(html);
  return {
    key: `${prefix}${relativePath}`,
    relativePath,
    kind,
    source: { type: 'inline', content: html },
    contentType: INDEX_CONTENT_TYPE,
    sha256: digest.sha256,
    md5: digest.md5,
    sizeBytes: digest.sizeBytes,
  };
}

/**
 * Materialize an index as the objects to publish.
 *
 * Order: every artifact, then every package page, then the root page.
 */
export function buildRemoteObjects(
  config: Pick<IndexConfig, 'prefix'>,
  index: SimpleIndex
): RemoteObject[] {
  const { prefix } = config;
  const artifacts: RemoteObject[] = [];
  const pages: RemoteObject[] = [];

  for (const page of index.packages) {
    for (const artifact of page.artifacts) {
      const relativePath = `${page.packageName}/${artifact.filename}`;
      artifacts.push({
        key: `${prefix}${relativePath}`,
        relativePath,
        kind: 'artifact',
        source: { type: 'file', path: artifact.localPath },
        contentType: artifact.contentType,
        sha256: artifact.sha256,
        md5: artifact.md5,
        sizeBytes: artifact.sizeBytes,
      });
    }

    pages.push(
      inlinePage(prefix, `${page.packageName}/${INDEX_FILENAME}`, 'package-index', renderPackageIndex(page))
    );
  }

  return [
    ...artifacts,
    ...pages,
    inlinePage(prefix, INDEX_FILENAME, 'root-index', renderRootIndex(index.root)),
  ];
}
