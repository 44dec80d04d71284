/**
 * @module @deckwright/cli/cli/program
 * Command line surface: argument parsing, logger setup, exit codes
 */

import { Command, CommanderError } from 'commander';
import { LogLevel, createLogger, type Logger } from '@deckwright/core';
import { VERSION } from '../version.js';
import * as fromConfig from './commands/from-config.js';
import * as fromDir from './commands/from-dir.js';
import type { FromDirFlags } from './commands/from-dir.js';
import { consolePresenter } from './presenter.js';
import type { CommandContext, Presenter } from './types.js';

export type GlobalFlags = {
  verbose: number;
  quiet?: boolean;
};

export interface RunCliOptions {
  presenter?: Presenter;
  /** Replaces the logger built from -v/-q */
  logger?: Logger;
  cwd?: string;
}

/**
 * -q wins over -v. Without either the LOG_LEVEL environment variable applies.
 */
export function resolveLogLevel(flags: GlobalFlags): LogLevel | undefined {
  if (flags.quiet) {return LogLevel.ERROR;}
  if (flags.verbose >= 2) {return LogLevel.DEBUG;}
  if (flags.verbose === 1) {return LogLevel.INFO;}
  return undefined;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function createProgram(
  presenter: Presenter,
  dispatch: (command: 'from-dir' | 'from-config', argv: string[], flags: FromDirFlags) => Promise<void>
): Command {
  const program = new Command();

  program
    .name('deckwright')
    .description('Assemble markdown slide files into a single reveal.js HTML document')
    .version(VERSION, '-V, --version')
    .option('-v, --verbose', 'increase log verbosity (repeatable)', increaseVerbosity, 0)
    .option('-q, --quiet', 'only log errors')
    .exitOverride()
    .configureOutput({
      writeOut: text => presenter.write(text.trimEnd()),
      writeErr: text => presenter.error(text.trimEnd()),
    });

  program
    .command('from-dir')
    .description('Build from every markdown file in a directory')
    .argument('<slide_dir>', 'directory holding the slide files')
    .argument('<template_file>', 'HTML template with {{ slides }} placeholder')
    .argument('<output_dir>', 'directory for the generated document')
    .argument('[output_file]', 'output file name', 'index.html')
    .option('-t, --title <title>', 'presentation title')
    .action(async function (this: Command) {
      await dispatch('from-dir', this.args, this.opts<FromDirFlags>());
    });

  program
    .command('from-config')
    .description('Build from a YAML config file')
    .argument('<config_path>', 'path to the config file')
    .action(async function (this: Command) {
      await dispatch('from-config', this.args, {});
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the selected
 * command. Resolves to the process exit code; never rejects on build errors.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const presenter = options.presenter ?? consolePresenter;
  let exitCode = 0;

  const program = createProgram(presenter, async (command, commandArgv, flags) => {
    const globals = program.opts<GlobalFlags>();
    const ctx: CommandContext = {
      cwd: options.cwd ?? process.cwd(),
      presenter,
      logger: options.logger ?? createLogger({ level: resolveLogLevel(globals), colors: process.stderr.isTTY }),
    };

    exitCode =
      command === 'from-dir'
        ? await fromDir.run(ctx, commandArgv, flags)
        : await fromConfig.run(ctx, commandArgv, {});
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  return exitCode;
}
