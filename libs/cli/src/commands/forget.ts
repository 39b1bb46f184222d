/**
 * Forget command
 *
 * Removes an application's launch record, e.g. after it was uninstalled.
 */

import { Command } from 'commander';
import type { Runtime } from '../runtime';
import { EXIT_CODES } from '../utils/exit-codes';
import type { ExitCode } from '../utils/exit-codes';
import type { CommandRunner } from './types';

export function runForget(runtime: Runtime, appId: string): ExitCode {
  const result = runtime.ctx.tracker.forget(appId);
  if (!result.ok) throw result.error;
  runtime.out(result.value ? `Forgot launch record of ${appId}` : `No launch record for ${appId}`);
  return EXIT_CODES.OK;
}

/**
 * Create the forget command
 */
export function createForgetCommand(run: CommandRunner): Command {
  return new Command('forget')
    .description('Remove the launch record of an application')
    .argument('<app>', 'Application id')
    .action(async (appId: string, _options: unknown, command: Command) => {
      await run(command, (runtime) => runForget(runtime, appId));
    });
}
