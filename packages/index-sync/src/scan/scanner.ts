/**
 * Artifact scanner.
 *
 * Lists a local directory (non-recursively) and turns every file with a
 * recognised distribution suffix into an Artifact. Other files are skipped.
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { NotFoundError } from '../errors.js';
import { hashFile } from '../sync/file-hasher.js';
import { matchDistribution } from './formats.js';
import { normalizePackageName, parseProjectName } from './package-name.js';
import type { Artifact } from './types.js';

async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Scan a directory for distribution artifacts.
 *
 * @param directory - Directory containing the built distributions
 * @returns Artifacts sorted by filename
 * @throws NotFoundError if the directory does not exist or is not a directory
 */
export async function scanArtifacts(directory: string, logger: Logger): Promise<Artifact[]> {
  const log = logger.child({ component: 'artifact-scanner' });
  const root = path.resolve(directory);

  const stat = await statOrNull(root);
  if (!stat) {
    throw new NotFoundError(root, `Package directory does not exist: ${root}`);
  }
  if (!stat.isDirectory()) {
    throw new NotFoundError(root, `Package directory is not a directory: ${root}`);
  }

  const entries = (await fs.readdir(root)).sort();
  const artifacts: Artifact[] = [];

  for (const filename of entries) {
    const localPath = path.join(root, filename);
    const entryStat = await statOrNull(localPath);
    if (!entryStat?.isFile()) continue;

    const match = matchDistribution(filename);
    if (!match) {
      log.debug({ filename }, 'Skipping file without a distribution suffix');
      continue;
    }

    const projectName = parseProjectName(match.stem);
    const packageName = normalizePackageName(projectName);
    if (!packageName || packageName === '-') {
      log.warn({ filename }, 'Skipping distribution without a project name');
      continue;
    }

    const digest = await hashFile(localPath);

    artifacts.push({
      filename,
      packageName,
      localPath,
      format: match.suffix.format,
      contentType: match.suffix.contentType,
      sha256: digest.sha256,
      md5: digest.md5,
      sizeBytes: digest.sizeBytes,
    });
  }

  log.info(
    { directory: root, artifacts: artifacts.length, skipped: entries.length - artifacts.length },
    'Scanned package directory'
  );

  return artifacts;
}
