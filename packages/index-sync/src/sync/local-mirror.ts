/**
 * Writes the generated index pages to a local directory, laid out as they
 * would be under the bucket prefix. Artifacts are not copied.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { RemoteObject } from '../index-builder/types.js';

/**
 * @returns Absolute paths of the files written, in object order
 */
export async function writeIndexToDirectory(
  objects: readonly RemoteObject[],
  directory: string
): Promise<string[]> {
  const root = path.resolve(directory);
  const written: string[] = [];

  for (const object of objects) {
    if (object.source.type !== 'inline') continue;

    const target = path.join(root, ...object.relativePath.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, object.source.content, 'utf-8');
    written.push(target);
  }

  return written;
}
