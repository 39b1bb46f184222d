/**
 * Per-invocation runtime: configuration, logger and run context
 */

import type { DestinationStream, Logger } from 'pino';
import { z } from 'zod';
import { LOG_LEVELS, LOG_LEVEL_ENV, LogLevelSchema } from '@idlewipe/ipc';
import type { Clock, LauncherConfig, LogLevel } from '@idlewipe/ipc';
import { getPlatform } from '@idlewipe/shred';
import type { Env, Platform } from '@idlewipe/shred';
import { ConfigError, createContext, createLogger, getConfigPath, getLogPath, loadConfigFile } from '@idlewipe/core';
import type { ProcessLauncher, RunContext } from '@idlewipe/core';

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  logLevel: z.string().optional(),
});
export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/** Seams for tests; production uses the real host */
export interface RuntimeOverrides {
  platform?: Platform;
  env?: Env;
  cwd?: string;
  clock?: Clock;
  launcher?: ProcessLauncher;
  /** Console log destination */
  console?: DestinationStream;
  /** Write the log file (default true) */
  logFile?: boolean;
  /** Command output, stdout by default */
  out?: (text: string) => void;
}

export interface Runtime {
  config: LauncherConfig;
  ctx: RunContext;
  logger: Logger;
  out: (text: string) => void;
}

/**
 * Console log level: --log-level, then IDLEWIPE_LOG_LEVEL, then the file's
 * log_level, then info.
 */
export function resolveLogLevel(flag: string | undefined, env: Env, config: Pick<LauncherConfig, 'logLevel'>): LogLevel {
  const requested = flag ?? env[LOG_LEVEL_ENV] ?? config.logLevel ?? 'info';
  const parsed = LogLevelSchema.safeParse(requested);
  if (!parsed.success) {
    throw new ConfigError(`Invalid log level '${requested}' (expected one of ${LOG_LEVELS.join(', ')})`, 'CONFIG_INVALID');
  }
  return parsed.data;
}

export function createRuntime(globals: GlobalOptions, overrides: RuntimeOverrides = {}): Runtime {
  const platform = overrides.platform ?? getPlatform();
  const env = overrides.env ?? process.env;

  const config = loadConfigFile(getConfigPath(platform, env, globals.config));
  const logger = createLogger({
    level: resolveLogLevel(globals.logLevel, env, config),
    logFile: overrides.logFile === false ? undefined : getLogPath(platform, env),
    console: overrides.console,
  });

  const ctx = createContext({
    logger,
    config,
    platform,
    env,
    cwd: overrides.cwd,
    clock: overrides.clock,
    launcher: overrides.launcher,
  });

  return {
    config,
    ctx,
    logger,
    out: overrides.out ?? ((text) => process.stdout.write(`${text}\n`)),
  };
}
