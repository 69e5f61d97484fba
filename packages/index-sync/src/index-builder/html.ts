/**
 * HTML rendering for simple index pages.
 *
 * Output is a pure function of the page: the same page always renders to
 * the same bytes.
 */

import type { PackageIndexPage, RootIndexPage } from './types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function renderDocument(title: string, body: string[]): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '  <head>',
    `    <title>${escapeHtml(title)}</title>`,
    '    <meta name="api-version" value="2" />',
    '  </head>',
    '  <body>',
    ...body.map((line) => `    ${line}`),
    '  </body>',
    '</html>',
    '',
  ].join('\n');
}

function renderLink(href: string, text: string): string[] {
  return [`<a href="${escapeHtml(href)}">${escapeHtml(text)}</a>`, '<br />'];
}

/** Render the root page: one link to `{name}/` per package. */
export function renderRootIndex(page: RootIndexPage): string {
  const links = page.packageNames.flatMap((name) =>
    renderLink(`${encodeURIComponent(name)}/`, name)
  );
  return renderDocument('Simple Index', links);
}

/**
 * Render a package page: one link per file, relative to the page, carrying
 * the file's sha256 as a URL fragment.
 */
export function renderPackageIndex(page: PackageIndexPage): string {
  const title = `Links for ${page.packageName}`;
  const links = page.artifacts.flatMap((artifact) =>
    renderLink(`${encodeURIComponent(artifact.filename)}#sha256=${artifact.sha256}`, artifact.filename)
  );
  return renderDocument(title, [`<h1>${escapeHtml(title)}</h1>`, ...links]);
}
