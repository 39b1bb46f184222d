/**
 * Launch service
 */

import type { CommandSpec, LauncherConfig, LaunchOutcome } from '@idlewipe/ipc';
import type { RunContext } from '../context';
import { resolveApp } from '../config/loader';
import { ConfigError, LaunchError, errorMessage } from '../errors';
import { normalizeCommand } from '../command';
import type { Argv } from '../command';

/**
 * Split and validate an application's command. Throws ConfigError.
 */
export function resolveCommand(ctx: Pick<RunContext, 'platform'>, appId: string, command: CommandSpec): Argv {
  let argv: Argv | null;
  try {
    argv = normalizeCommand(command, ctx.platform.kind);
  } catch (error) {
    throw new ConfigError(`Cannot parse 'cmd' for app '${appId}': ${errorMessage(error)}`, 'APP_INVALID', { appId, cause: error });
  }
  if (!argv) {
    throw new ConfigError(`'cmd' for app '${appId}' does not name an executable`, 'APP_INVALID', { appId });
  }
  return argv;
}

/**
 * Start an application detached and record the launch.
 *
 * Throws ConfigError or LaunchError when the app cannot be started. Failing
 * to record the launch is logged and reported in the outcome only.
 */
export async function launchApp(ctx: RunContext, config: LauncherConfig, appId: string): Promise<LaunchOutcome> {
  const app = resolveApp(config, appId);
  const [program, ...args] = resolveCommand(ctx, appId, app.command);

  const executable = ctx.platform.findExecutable(program, ctx.env);
  if (!executable) {
    throw new LaunchError(`Executable not found for app '${appId}': ${program}`, 'EXECUTABLE_NOT_FOUND', appId);
  }

  let pid: number | undefined;
  try {
    ({ pid } = await ctx.launcher.launch(executable, args, { env: ctx.env, cwd: ctx.cwd }));
  } catch (error) {
    throw new LaunchError(`Failed to launch app '${appId}': ${errorMessage(error)}`, 'SPAWN_FAILED', appId, { cause: error });
  }

  const argv = [executable, ...args];
  ctx.logger.info({ appId, pid, argv }, 'Launched app');

  const recorded = ctx.tracker.recordLaunch(appId);
  if (!recorded.ok) {
    ctx.logger.warn({ appId, code: recorded.error.code }, 'Launch was not recorded; idle time still counts from the previous launch');
    return { appId, argv, pid, storeError: recorded.error.message };
  }

  return { appId, argv, pid, recordedAt: recorded.value.toISOString() };
}
