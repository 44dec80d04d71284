/**
 * SlideListResolver - turns a SlideListSpec into ordered absolute paths
 */

import fs from 'fs-extra';
import path from 'node:path';
import type { PipelineOptions, SlideListSpec } from '../types/index.js';
import { createDeckError } from '../error/deck-error.js';
import { SilentLogger } from '../logging/logger.js';
import { discoverSlides } from './discover.js';

export async function resolveSlideList(
  spec: SlideListSpec,
  options: PipelineOptions = {}
): Promise<string[]> {
  switch (spec.kind) {
    case 'discover': {
      const slides = await discoverSlides(spec.directory, options);
      return slides.map(slide => slide.sourcePath);
    }
    case 'explicit':
      return resolveExplicit(spec.names, spec.baseDirectory, options);
  }
}

/**
 * Caller order is kept verbatim. Every entry is checked before anything
 * is returned, so a missing file aborts the whole deck.
 */
async function resolveExplicit(
  names: readonly string[],
  baseDirectory: string,
  options: PipelineOptions
): Promise<string[]> {
  const logger = options.logger ?? new SilentLogger();
  const base = path.resolve(baseDirectory);
  const resolved: string[] = [];

  for (const name of names) {
    const fullPath = path.resolve(base, name);
    if (!(await isRegularFile(fullPath))) {
      throw createDeckError('DECK_MISSING_SLIDE', `Slide file ${name} not found at ${fullPath}`, {
        name,
        path: fullPath,
      });
    }
    resolved.push(fullPath);
  }

  logger.debug(`Resolved ${resolved.length} listed slides`, { baseDirectory: base });
  return resolved;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}
