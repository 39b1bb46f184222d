/**
 * Command-line program definition
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS } from '@idlewipe/ipc';
import { errorCode, errorMessage } from '@idlewipe/core';
import {
  createLaunchCommand,
  createTaskCommand,
  createTaskAllCommand,
  createStatusCommand,
  createCheckCommand,
  createForgetCommand,
} from './commands/index';
import type { CommandRunner } from './commands/index';
import { createRuntime, GlobalOptionsSchema } from './runtime';
import type { Runtime, RuntimeOverrides } from './runtime';
import { EXIT_CODES } from './utils/exit-codes';

const VERSION = '0.1.0';

export interface ProgramOptions {
  runtime?: RuntimeOverrides;
  setExitCode?: (code: number) => void;
  /** Error output used before a logger exists */
  writeError?: (text: string) => void;
}

/**
 * Create and configure the main CLI program
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const setExitCode = options.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });
  const writeError = options.writeError ?? ((text: string) => {
    process.stderr.write(`${text}\n`);
  });

  const run: CommandRunner = async (command, body) => {
    let runtime: Runtime | undefined;
    try {
      runtime = createRuntime(GlobalOptionsSchema.parse(command.optsWithGlobals()), options.runtime);
      setExitCode(await body(runtime));
    } catch (error) {
      if (runtime) {
        runtime.logger.error({ code: errorCode(error), err: error }, errorMessage(error));
      } else {
        writeError(`Error: ${errorMessage(error)}`);
      }
      setExitCode(EXIT_CODES.ERROR);
    }
  };

  const program = new Command();

  program
    .name('idlewipe')
    .description('Launch applications and securely wipe the data of those left idle')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-c, --config <path>', 'Configuration file (default: config.json in the state directory)')
    .addOption(new Option('-l, --log-level <level>', 'Console log level').choices(LOG_LEVELS))
    .addHelpText(
      'after',
      `
Examples:
  $ idlewipe launch firefox      Launch and record
  $ idlewipe task-all            Run from a scheduler, e.g. daily
  $ idlewipe status              Show idle time per app
`,
    );

  // Register commands
  program.addCommand(createLaunchCommand(run));
  program.addCommand(createTaskCommand(run));
  program.addCommand(createTaskAllCommand(run));
  program.addCommand(createStatusCommand(run));
  program.addCommand(createCheckCommand(run));
  program.addCommand(createForgetCommand(run));

  return program;
}
