/**
 * CLI command module type definition
 */

import type { Logger } from '@deckwright/core';

/**
 * Destination of user-facing lines. Logs go through the logger instead.
 */
export interface Presenter {
  write(message: string): void;
  error(message: string): void;
}

export interface CommandContext {
  cwd: string;
  presenter: Presenter;
  logger: Logger;
}

export type CommandModule<TFlags extends object = Record<string, never>> = {
  run: (ctx: CommandContext, argv: string[], flags: TFlags) => Promise<number>;
};
