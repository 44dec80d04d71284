/**
 * SlideDiscoverer - lists the markdown slides of a directory
 *
 * Responsibilities:
 * - Reject paths that are not directories
 * - Keep immediate regular files with the markdown extension
 * - Return them in natural order
 */

import fg from 'fast-glob';
import fs from 'fs-extra';
import type { Stats } from 'node:fs';
import path from 'node:path';
import type { PipelineOptions, SlideFile } from '../types/index.js';
import { createDeckError, describeCause } from '../error/deck-error.js';
import { SilentLogger } from '../logging/logger.js';
import { deriveOrderKey, sortByOrderKey } from '../ordering/order-key.js';
import { isMarkdownFile } from '../utils/paths.js';

export async function discoverSlides(
  directory: string,
  options: PipelineOptions = {}
): Promise<SlideFile[]> {
  const logger = options.logger ?? new SilentLogger();
  const dir = path.resolve(directory);

  await assertDirectory(dir);

  const entries = await fg('*', {
    cwd: dir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: true,
    deep: 1,
  });

  const slides: SlideFile[] = [];
  for (const name of entries) {
    if (!isMarkdownFile(name)) {
      logger.debug(`Skipping ${name}: not a markdown file`, { directory: dir });
      continue;
    }
    slides.push({
      sourcePath: path.join(dir, name),
      name,
      orderKey: deriveOrderKey(name),
    });
  }

  if (slides.length === 0) {
    logger.warn(`No markdown slides found in ${dir}`, { code: 'DECK_EMPTY_DIRECTORY' });
    return [];
  }

  const sorted = sortByOrderKey(slides, slide => slide.orderKey);
  logger.debug(`Discovered ${sorted.length} slides`, {
    directory: dir,
    order: sorted.map(slide => slide.name),
  });
  return sorted;
}

async function assertDirectory(dir: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(dir);
  } catch (error) {
    throw createDeckError('DECK_NOT_A_DIRECTORY', `Slide directory ${dir} cannot be read: ${describeCause(error)}`, {
      path: dir,
    });
  }

  if (!stats.isDirectory()) {
    throw createDeckError('DECK_NOT_A_DIRECTORY', `${dir} is not a directory`, { path: dir });
  }
}
