/**
 * Check command
 *
 * Validates every application entry in the configuration file.
 */

import { Command } from 'commander';
import { listAppIds, validateConfig } from '@idlewipe/core';
import type { Runtime } from '../runtime';
import { formatIssues } from '../format';
import { EXIT_CODES } from '../utils/exit-codes';
import type { ExitCode } from '../utils/exit-codes';
import type { CommandRunner } from './types';

export function runCheck(runtime: Runtime): ExitCode {
  const issues = validateConfig(runtime.config);
  if (issues.length > 0) {
    runtime.out(formatIssues(issues));
    return EXIT_CODES.ERROR;
  }
  runtime.out(`${runtime.config.source}: ${listAppIds(runtime.config).length} app(s), no problems found`);
  return EXIT_CODES.OK;
}

/**
 * Create the check command
 */
export function createCheckCommand(run: CommandRunner): Command {
  return new Command('check')
    .description('Validate the configuration file')
    .action(async (_options: unknown, command: Command) => {
      await run(command, (runtime) => runCheck(runtime));
    });
}
