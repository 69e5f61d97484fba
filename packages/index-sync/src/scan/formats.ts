/**
 * Recognised distribution formats.
 *
 * The table is closed: a new format is added here and nowhere else.
 * Longer suffixes come first so .tar.gz is not mistaken for something else.
 */

import type { DistributionFormat, DistributionSuffix } from './types.js';

export const DISTRIBUTION_SUFFIXES: readonly DistributionSuffix[] = [
  { suffix: '.tar.gz', format: 'sdist', contentType: 'application/gzip' },
  { suffix: '.tar.bz2', format: 'sdist', contentType: 'application/x-bzip2' },
  { suffix: '.whl', format: 'wheel', contentType: 'application/zip' },
  { suffix: '.zip', format: 'sdist', contentType: 'application/zip' },
  { suffix: '.egg', format: 'egg', contentType: 'application/zip' },
] as const;

/** A filename split into its stem and recognised suffix */
export interface MatchedDistribution {
  stem: string;
  suffix: DistributionSuffix;
}

/**
 * Match a filename against the recognised suffixes (case-insensitive).
 * Returns null for files that are not distributions.
 */
export function matchDistribution(filename: string): MatchedDistribution | null {
  const lowered = filename.toLowerCase();
  for (const entry of DISTRIBUTION_SUFFIXES) {
    if (lowered.endsWith(entry.suffix)) {
      return {
        stem: filename.slice(0, filename.length - entry.suffix.length),
        suffix: entry,
      };
    }
  }
  return null;
}
