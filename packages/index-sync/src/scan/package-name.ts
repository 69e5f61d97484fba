/**
 * Project name extraction and PEP 503 normalization.
 */

/**
 * Normalize a project name: lowercase, with every run of '.', '_' and '-'
 * collapsed to a single '-'.
 */
export function normalizePackageName(name: string): string {
  return name.replace(/[-_.]+/g, '-').toLowerCase();
}

/**
 * Take the project name from a distribution filename stem (the filename
 * without its suffix).
 *
 * The name ends at the first '-' that starts a version segment (is followed
 * by a digit). Stems without one fall back to the first '_' followed by a
 * digit, then to the first '-', then to the whole stem.
 *
 *   foo-1.0                   -> foo
 *   Foo_1.1                   -> Foo
 *   my_pkg-1.0-py3-none-any   -> my_pkg
 *   zope.interface-6.0        -> zope.interface
 */
export function parseProjectName(stem: string): string {
  const versionDash = /-(?=\d)/.exec(stem);
  if (versionDash) {
    return stem.slice(0, versionDash.index);
  }

  const versionUnderscore = /_(?=\d)/.exec(stem);
  if (versionUnderscore) {
    return stem.slice(0, versionUnderscore.index);
  }

  const dash = stem.indexOf('-');
  return dash === -1 ? stem : stem.slice(0, dash);
}
