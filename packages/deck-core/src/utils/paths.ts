/**
 * Path utilities for deckwright
 */

import path from 'node:path';

export const MARKDOWN_EXTENSION = '.md';

/**
 * Convert path to POSIX format (forward slashes)
 */
export function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * True when the file name carries the markdown extension (case-insensitive)
 */
export function isMarkdownFile(fileName: string): boolean {
  return fileName.toLowerCase().endsWith(MARKDOWN_EXTENSION);
}

/**
 * File name without the markdown extension
 */
export function markdownStem(fileName: string): string {
  const base = path.basename(fileName);
  return isMarkdownFile(base) ? base.slice(0, -MARKDOWN_EXTENSION.length) : base;
}

/**
 * Both paths name the same directory once resolved
 */
export function isSameDirectory(a: string, b: string): boolean {
  return path.resolve(a) === path.resolve(b);
}
