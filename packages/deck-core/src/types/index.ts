/**
 * Core types for deckwright
 */

import type { Logger } from '../logging/logger.js';

/**
 * Sort key derived from a slide file name.
 * `numericPrefix` is absent when the stem has no leading digits.
 */
export interface NameOrderKey {
  numericPrefix?: bigint;
  alphaSuffix: string;
  rawName: string;
}

export interface SlideFile {
  sourcePath: string;             // absolute
  name: string;                   // base name with extension
  orderKey: NameOrderKey;
}

/**
 * Which files make up the deck.
 * Explicit lists keep the caller's order; discovery always re-sorts.
 */
export type SlideListSpec =
  | { kind: 'discover'; directory: string }
  | { kind: 'explicit'; names: readonly string[]; baseDirectory: string };

export interface AssemblyConfig {
  readonly title: string;
  readonly slideSourceDir: string;
  readonly outputPath: string;
  readonly templatePath: string;
  readonly slideList: SlideListSpec;
}

export interface RewriteContext {
  fragmentSourceDir: string;
  outputDir: string;
}

export interface AssembledSlide {
  sourcePath: string;
  localReferences: string[];
}

export interface MissingResource {
  slide: string;                  // slide source path
  reference: string;              // target as written
  resolvedPath: string;
}

export interface AssembledDeck {
  body: string;
  slides: AssembledSlide[];
  missingResources: MissingResource[];
}

export interface PipelineOptions {
  logger?: Logger;
}
