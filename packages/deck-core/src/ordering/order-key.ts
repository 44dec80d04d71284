/**
 * @module @deckwright/core/ordering
 * Natural ordering of slide file names: 1.md, 1a.md, 1b.md, 2.md, 10.md
 */

import type { NameOrderKey } from '../types/index.js';
import { markdownStem } from '../utils/paths.js';

const LEADING_DIGITS = /^(\d+)(.*)$/s;

/**
 * Derive the order key of a file name.
 * The remainder after the leading digit run is kept verbatim, so `1a2.md`
 * compares its suffix `a2` as an opaque string.
 */
export function deriveOrderKey(fileName: string): NameOrderKey {
  const stem = markdownStem(fileName);
  const match = LEADING_DIGITS.exec(stem);

  if (!match) {
    return { alphaSuffix: stem, rawName: fileName };
  }

  return {
    numericPrefix: BigInt(match[1] ?? '0'),
    alphaSuffix: match[2] ?? '',
    rawName: fileName,
  };
}

/**
 * Compare two keys. Numbered names come first, by value; ties fall back to
 * the suffix in code point order. Returns 0 only for identical prefix+suffix.
 */
export function compareOrderKeys(a: NameOrderKey, b: NameOrderKey): number {
  if (a.numericPrefix !== undefined && b.numericPrefix !== undefined) {
    if (a.numericPrefix !== b.numericPrefix) {
      return a.numericPrefix < b.numericPrefix ? -1 : 1;
    }
  } else if (a.numericPrefix !== undefined) {
    return -1;
  } else if (b.numericPrefix !== undefined) {
    return 1;
  }

  return compareCodePoints(a.alphaSuffix, b.alphaSuffix);
}

/**
 * Stable sort by order key; equal keys keep their input order
 */
export function sortByOrderKey<T>(items: readonly T[], keyOf: (item: T) => NameOrderKey): T[] {
  return items
    .map((item, index) => ({ item, index, key: keyOf(item) }))
    .sort((a, b) => compareOrderKeys(a.key, b.key) || a.index - b.index)
    .map(entry => entry.item);
}

function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }

  return left.length - right.length;
}
