/**
 * Launch command
 *
 * Starts an application detached and records the launch time.
 */

import { Command } from 'commander';
import { launchApp } from '@idlewipe/core';
import type { Runtime } from '../runtime';
import { EXIT_CODES } from '../utils/exit-codes';
import type { ExitCode } from '../utils/exit-codes';
import type { CommandRunner } from './types';

export async function runLaunch(runtime: Runtime, appId: string): Promise<ExitCode> {
  const outcome = await launchApp(runtime.ctx, runtime.config, appId);
  runtime.out(
    outcome.recordedAt
      ? `Launched ${appId} (pid ${outcome.pid ?? 'unknown'})`
      : `Launched ${appId} (pid ${outcome.pid ?? 'unknown'}); launch time not recorded: ${outcome.storeError ?? 'unknown error'}`,
  );
  return EXIT_CODES.OK;
}

/**
 * Create the launch command
 */
export function createLaunchCommand(run: CommandRunner): Command {
  return new Command('launch')
    .description('Launch an application and record the launch time')
    .argument('<app>', 'Application id from the configuration')
    .action(async (appId: string, _options: unknown, command: Command) => {
      await run(command, (runtime) => runLaunch(runtime, appId));
    });
}
