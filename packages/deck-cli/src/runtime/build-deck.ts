/**
 * @module @deckwright/cli/runtime/build-deck
 * Runs one deck build: template, slide list, assembly, injection, write
 */

import fs from 'fs-extra';
import {
  SilentLogger,
  assembleSlides,
  assertTemplatePlaceholders,
  createDeckError,
  describeCause,
  injectTemplate,
  resolveSlideList,
  type AssemblyConfig,
  type MissingResource,
  type PipelineOptions,
} from '@deckwright/core';
import { writeOutputFile } from '../output/write-output.js';

export interface BuildResult {
  outputPath: string;
  slideCount: number;
  missingResources: MissingResource[];
}

/**
 * Every fatal condition on the inputs is raised before the output file is
 * touched, so a failed build leaves any previous document in place.
 */
export async function buildDeck(config: AssemblyConfig, options: PipelineOptions = {}): Promise<BuildResult> {
  const logger = options.logger ?? new SilentLogger();

  const template = await readTemplate(config.templatePath);
  const placeholders = assertTemplatePlaceholders(template, config.templatePath);
  if (!placeholders.title) {
    logger.debug('Template has no {{ slide_title }} placeholder', { path: config.templatePath });
  }

  const slidePaths = await resolveSlideList(config.slideList, { logger });
  const deck = await assembleSlides(config, slidePaths, { logger });
  const document = injectTemplate(template, { title: config.title, slides: deck.body }, config.templatePath);

  if (await fs.pathExists(config.outputPath)) {
    logger.warn(`Overwriting existing file ${config.outputPath}`);
  }
  await writeOutputFile(config.outputPath, document);
  logger.info(`Wrote ${deck.slides.length} slides`, { path: config.outputPath });

  return {
    outputPath: config.outputPath,
    slideCount: deck.slides.length,
    missingResources: deck.missingResources,
  };
}

async function readTemplate(templatePath: string): Promise<string> {
  if (!(await isRegularFile(templatePath))) {
    throw createDeckError('DECK_TEMPLATE_NOT_FOUND', `Template file ${templatePath} not found`, {
      path: templatePath,
    });
  }

  try {
    return await fs.readFile(templatePath, 'utf8');
  } catch (error) {
    throw createDeckError('DECK_READ_ERROR', `Cannot read template ${templatePath}: ${describeCause(error)}`, {
      path: templatePath,
    });
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
