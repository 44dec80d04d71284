/**
 * SlideAssembler - reads, rewrites and wraps slides into one body
 */

import fs from 'fs-extra';
import path from 'node:path';
import type {
  AssembledDeck,
  AssemblyConfig,
  MissingResource,
  PipelineOptions,
  RewriteContext,
} from '../types/index.js';
import { createDeckError, describeCause } from '../error/deck-error.js';
import { SilentLogger } from '../logging/logger.js';
import { collectLocalReferences, resolveTarget, rewriteMarkdownPaths } from '../rewrite/path-rewriter.js';

/**
 * Wrap one fragment in a reveal.js markdown section
 */
export function wrapSlideSection(markdown: string): string {
  const safe = markdown.replace(/<\/textarea/gi, '&lt;/textarea');
  return `<section data-markdown>\n<textarea data-template>\n${safe}\n</textarea>\n</section>`;
}

interface ProcessedSlide {
  sourcePath: string;
  section: string;
  localReferences: string[];
  missing: MissingResource[];
}

/**
 * Build the slide body for `resolvedPaths`, in that order.
 * Reads run concurrently; results are placed by index.
 */
export async function assembleSlides(
  config: AssemblyConfig,
  resolvedPaths: readonly string[],
  options: PipelineOptions = {}
): Promise<AssembledDeck> {
  const logger = options.logger ?? new SilentLogger();
  const outputDir = path.dirname(path.resolve(config.outputPath));

  const processed = await Promise.all(
    resolvedPaths.map(sourcePath => processSlide(sourcePath, outputDir))
  );

  const missingResources = processed.flatMap(slide => slide.missing);
  for (const missing of missingResources) {
    logger.warn(`Slide ${missing.slide} references missing file ${missing.reference}`, {
      code: 'DECK_MISSING_RESOURCE',
      resolvedPath: missing.resolvedPath,
    });
  }

  logger.info(`Assembled ${processed.length} slides`, { outputDir });

  return {
    body: processed.map(slide => slide.section).join('\n'),
    slides: processed.map(({ sourcePath, localReferences }) => ({ sourcePath, localReferences })),
    missingResources,
  };
}

async function processSlide(sourcePath: string, outputDir: string): Promise<ProcessedSlide> {
  let content: string;
  try {
    content = await fs.readFile(sourcePath, 'utf8');
  } catch (error) {
    throw createDeckError('DECK_READ_ERROR', `Cannot read slide ${sourcePath}: ${describeCause(error)}`, {
      path: sourcePath,
      cause: error,
    });
  }

  const context: RewriteContext = {
    fragmentSourceDir: path.dirname(sourcePath),
    outputDir,
  };

  const localReferences = collectLocalReferences(content);
  const missing: MissingResource[] = [];
  for (const reference of localReferences) {
    const resolvedPath = resolveTarget(safeDecode(reference), context.fragmentSourceDir);
    if (!(await fs.pathExists(resolvedPath))) {
      missing.push({ slide: sourcePath, reference, resolvedPath });
    }
  }

  return {
    sourcePath,
    section: wrapSlideSection(rewriteMarkdownPaths(content, context)),
    localReferences,
    missing,
  };
}

function safeDecode(reference: string): string {
  try {
    return decodeURI(reference);
  } catch {
    return reference;
  }
}
