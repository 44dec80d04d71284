import type { AssemblyConfig } from '@deckwright/core';
import { getExitCode, wrapError } from '@deckwright/core';
import { buildDeck } from '../../runtime/build-deck.js';
import { presentError } from '../presenter.js';
import type { CommandContext } from '../types.js';

/**
 * Build from a lazily loaded config and report the outcome
 */
export async function executeBuild(ctx: CommandContext, loadConfig: () => Promise<AssemblyConfig>): Promise<number> {
  try {
    const config = await loadConfig();
    const result = await buildDeck(config, { logger: ctx.logger });
    ctx.presenter.write(`Slides written to ${result.outputPath}`);
    return 0;
  } catch (error) {
    const deckError = wrapError(error);
    presentError(ctx.presenter, deckError);
    return getExitCode(deckError);
  }
}
