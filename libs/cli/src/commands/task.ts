/**
 * Task command
 *
 * Securely deletes an application's cleanup paths once it has been idle
 * longer than its threshold.
 */

import { Command } from 'commander';
import { runTask } from '@idlewipe/core';
import type { Runtime } from '../runtime';
import { formatOutcome } from '../format';
import { exitCodeForOutcome } from '../utils/exit-codes';
import type { ExitCode } from '../utils/exit-codes';
import type { CommandRunner } from './types';

export function runTaskCommand(runtime: Runtime, appId: string): ExitCode {
  const outcome = runTask(runtime.ctx, runtime.config, appId);
  runtime.out(formatOutcome(outcome));
  return exitCodeForOutcome(outcome);
}

/**
 * Create the task command
 */
export function createTaskCommand(run: CommandRunner): Command {
  return new Command('task')
    .description('Destroy an idle application\'s data if it exceeded its idle threshold')
    .argument('<app>', 'Application id from the configuration')
    .action(async (appId: string, _options: unknown, command: Command) => {
      await run(command, (runtime) => runTaskCommand(runtime, appId));
    });
}
