/**
 * Content digests for change detection.
 *
 * SHA-256 is the digest recorded on every uploaded object and published in
 * the index (#sha256= fragments). MD5 is computed alongside it so objects
 * uploaded without our metadata can still be matched by their ETag.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';

/** Digests of a file or buffer */
export interface ContentDigest {
  /** SHA-256 hex digest */
  sha256: string;
  /** MD5 hex digest (the ETag S3 assigns to single-part uploads) */
  md5: string;
  /** Content size in bytes */
  sizeBytes: number;
}

/**
 * Compute the digests of a file using a streaming approach.
 *
 * @throws If the file cannot be read
 */
export async function hashFile(filePath: string): Promise<ContentDigest> {
  return new Promise<ContentDigest>((resolve, reject) => {
    const sha256 = crypto.createHash('sha256');
    const md5 = crypto.createHash('md5');
    let sizeBytes = 0;

    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      sizeBytes += chunk.length;
      sha256.update(chunk);
      md5.update(chunk);
    });

    stream.on('end', () => {
      resolve({
        sha256: sha256.digest('hex'),
        md5: md5.digest('hex'),
        sizeBytes,
      });
    });

    stream.on('error', (err: Error) => {
      reject(new Error(`Failed to hash file ${filePath}: ${err.message}`));
    });
  });
}

/** Compute the digests of in-memory content. */
export function hashBuffer(content: Buffer | string): ContentDigest {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return {
    sha256: crypto.createHash('sha256').update(buffer).digest('hex'),
    md5: crypto.createHash('md5').update(buffer).digest('hex'),
    sizeBytes: buffer.length,
  };
}
