/**
 * from-config command: build from a YAML config file
 */

import { createDeckError } from '@deckwright/core';
import { loadConfigFile } from '../../config/load-config.js';
import type { CommandModule } from '../types.js';
import { executeBuild } from './shared.js';

export const run: CommandModule['run'] = async (ctx, argv) => {
  const [configPath] = argv;

  return executeBuild(ctx, async () => {
    if (!configPath) {
      throw createDeckError('DECK_BAD_ARGS', 'from-config needs <config_path>');
    }
    return loadConfigFile(configPath, ctx.cwd);
  });
};
