/**
 * @module @deckwright/core/rewrite/path-rewriter
 * Re-expresses relative link and image targets against the output document.
 */

import path from 'node:path';
import type { RewriteContext } from '../types/index.js';
import { isSameDirectory, toPosix } from '../utils/paths.js';
import { scanLinkDestinations } from './link-scanner.js';

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const WINDOWS_DRIVE = /^[a-z]:[\\/]/i;
const MARKDOWN_ESCAPE = /\\([!-\/:-@\[-`{-~])/g;

/**
 * True for targets that resolve relative to the file containing them.
 * Absolute paths, URLs with a scheme and `#fragment` targets are not.
 */
export function isRelocatableTarget(target: string): boolean {
  if (target === '' || target.startsWith('#') || target.startsWith('?')) {
    return false;
  }
  if (target.startsWith('/') || target.startsWith('\\') || WINDOWS_DRIVE.test(target)) {
    return false;
  }
  return !target.includes('://') && !URL_SCHEME.test(target);
}

/**
 * Split a target into its path and the `?query` / `#fragment` suffix.
 * A backslash-escaped `?` or `#` belongs to the path.
 */
export function splitTarget(target: string): { pathPart: string; suffix: string } {
  for (let i = 0; i < target.length; i++) {
    const ch = target[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (ch === '?' || ch === '#') {
      return { pathPart: target.slice(0, i), suffix: target.slice(i) };
    }
  }
  return { pathPart: target, suffix: '' };
}

function unescapeMarkdown(value: string): string {
  return value.replace(MARKDOWN_ESCAPE, '$1');
}

/**
 * Absolute file location a relocatable target points at
 */
export function resolveTarget(target: string, fromDir: string): string {
  const { pathPart } = splitTarget(target);
  return path.resolve(fromDir, toPosix(unescapeMarkdown(pathPart)));
}

/**
 * Rewrite one relocatable target for the output directory
 */
export function relocateTarget(target: string, context: RewriteContext): string {
  const { pathPart, suffix } = splitTarget(target);
  if (pathPart === '') {
    return target;
  }

  const absolute = resolveTarget(target, context.fragmentSourceDir);
  let relative = toPosix(path.relative(path.resolve(context.outputDir), absolute)) || '.';

  if (/[\\/]$/.test(unescapeMarkdown(pathPart)) && !relative.endsWith('/')) {
    relative += '/';
  }

  // A literal ? or # in a file name must not start the suffix
  return relative.replace(/[?#]/g, '\\$&') + suffix;
}

/**
 * Rewrite every relative link/image target in a markdown fragment so it
 * resolves from `outputDir` to the same file it resolved to from
 * `fragmentSourceDir`. Everything except those targets is kept byte for byte.
 * Never throws.
 */
export function rewriteMarkdownPaths(markdown: string, context: RewriteContext): string {
  if (isSameDirectory(context.fragmentSourceDir, context.outputDir)) {
    return markdown;
  }

  let output = '';
  let last = 0;

  for (const destination of scanLinkDestinations(markdown)) {
    if (!isRelocatableTarget(destination.target)) {
      continue;
    }

    const relocated = relocateTarget(destination.target, context);
    output += markdown.slice(last, destination.start);
    output += formatDestination(relocated, destination.angled);
    last = destination.end;
  }

  return output + markdown.slice(last);
}

/**
 * Relocatable targets of a fragment, in document order
 */
export function collectLocalReferences(markdown: string): string[] {
  return scanLinkDestinations(markdown)
    .map(destination => destination.target)
    .filter(isRelocatableTarget);
}

function formatDestination(target: string, angled: boolean): string {
  if (angled) {
    return target.replace(/[<>]/g, '\\$&');
  }
  // Bare destinations cannot carry whitespace or unbalanced parentheses
  if (/[\s()]/.test(target)) {
    return `<${target.replace(/[<>]/g, '\\$&')}>`;
  }
  return target;
}
