/**
 * from-dir command: every markdown file in one directory, in natural order
 */

import { createDeckError } from '@deckwright/core';
import { buildDirectoryConfig } from '../../config/load-config.js';
import type { CommandModule } from '../types.js';
import { executeBuild } from './shared.js';

export type FromDirFlags = {
  title?: string;
};

export const run: CommandModule<FromDirFlags>['run'] = async (ctx, argv, flags) => {
  const [slideDir, templateFile, outputDir, outputFile] = argv;

  return executeBuild(ctx, async () => {
    if (!slideDir || !templateFile || !outputDir) {
      throw createDeckError('DECK_BAD_ARGS', 'from-dir needs <slide_dir> <template_file> <output_dir>');
    }
    return buildDirectoryConfig({ slideDir, templateFile, outputDir, outputFile, title: flags.title }, ctx.cwd);
  });
};
