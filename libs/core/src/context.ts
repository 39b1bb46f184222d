/**
 * Run context
 *
 * Everything a task or launch needs from the outside world, gathered in one
 * object so tests can swap the clock, store, launcher and platform.
 */

import type { Logger } from 'pino';
import { WIPE_DEFAULTS, systemClock } from '@idlewipe/ipc';
import type { Clock, LauncherConfig, WipeEvent } from '@idlewipe/ipc';
import { SecureDeleter, getPlatform } from '@idlewipe/shred';
import type { Env, Platform } from '@idlewipe/shred';
import { UsageTracker } from '@idlewipe/storage';
import { getDbPath } from './config/paths';
import { detachedLauncher } from './launcher';
import type { ProcessLauncher } from './launcher';

export interface RunContext {
  logger: Logger;
  clock: Clock;
  platform: Platform;
  env: Env;
  /** Base for relative cleanup paths */
  cwd: string;
  /** Default overwrite passes for targets without their own */
  passes: number;
  tracker: UsageTracker;
  deleter: SecureDeleter;
  launcher: ProcessLauncher;
}

export interface CreateContextOptions {
  logger: Logger;
  config?: LauncherConfig;
  clock?: Clock;
  platform?: Platform;
  env?: Env;
  cwd?: string;
  /** Usage store location; defaults to state.db in the state directory */
  dbPath?: string;
  launcher?: ProcessLauncher;
  onWipeEvent?: (event: WipeEvent) => void;
}

export function createContext(options: CreateContextOptions): RunContext {
  const { logger } = options;
  const platform = options.platform ?? getPlatform();
  const env = options.env ?? process.env;
  const clock = options.clock ?? systemClock;
  const passes = options.config?.passes ?? WIPE_DEFAULTS.PASSES;

  return {
    logger,
    clock,
    platform,
    env,
    cwd: options.cwd ?? process.cwd(),
    passes,
    tracker: new UsageTracker({
      dbPath: options.dbPath ?? getDbPath(platform, env),
      logger: logger.child({ component: 'tracker' }),
      clock,
    }),
    deleter: new SecureDeleter({
      logger: logger.child({ component: 'shred' }),
      passes,
      onEvent: options.onWipeEvent,
    }),
    launcher: options.launcher ?? detachedLauncher,
  };
}
