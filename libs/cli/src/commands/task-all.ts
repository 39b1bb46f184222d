/**
 * Task-all command
 *
 * Runs the idle check for every configured application.
 */

import { Command } from 'commander';
import { runTaskAll } from '@idlewipe/core';
import type { Runtime } from '../runtime';
import { formatOutcome } from '../format';
import { exitCodeForBatch } from '../utils/exit-codes';
import type { ExitCode } from '../utils/exit-codes';
import type { CommandRunner } from './types';

export function runTaskAllCommand(runtime: Runtime): ExitCode {
  const batch = runTaskAll(runtime.ctx, runtime.config);
  if (batch.results.length === 0) {
    runtime.out('No apps configured.');
  }
  for (const entry of batch.results) {
    runtime.out('outcome' in entry ? formatOutcome(entry.outcome) : `${entry.appId}: failed: ${entry.error}`);
  }
  return exitCodeForBatch(batch);
}

/**
 * Create the task-all command
 */
export function createTaskAllCommand(run: CommandRunner): Command {
  return new Command('task-all')
    .description('Run the idle check for every configured application')
    .action(async (_options: unknown, command: Command) => {
      await run(command, (runtime) => runTaskAllCommand(runtime));
    });
}
