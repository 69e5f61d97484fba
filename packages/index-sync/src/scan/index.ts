export { scanArtifacts } from './scanner.js';
export { normalizePackageName, parseProjectName } from './package-name.js';
export { DISTRIBUTION_SUFFIXES, matchDistribution } from './formats.js';

export type { MatchedDistribution } from './formats.js';
export type { Artifact, DistributionFormat, DistributionSuffix } from './types.js';
