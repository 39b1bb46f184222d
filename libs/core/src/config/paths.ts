/**
 * Configuration path utilities
 */

import { CONFIG_ENV, CONFIG_FILE, DB_FILENAME, HOME_ENV, LOG_FILE, STATE_DIR } from '@idlewipe/ipc';
import type { Env, Platform } from '@idlewipe/shred';

/**
 * Get the per-user state directory (store, config and log).
 * Respects IDLEWIPE_HOME for tests and portable installs.
 */
export function getStateDir(platform: Platform, env: Env): string {
  const override = env[HOME_ENV];
  if (override) return platform.path.resolve(override);
  return platform.path.join(platform.stateBaseDir(env), STATE_DIR);
}

/**
 * Get the configuration file path: explicit override, then IDLEWIPE_CONFIG,
 * then config.json in the state directory.
 */
export function getConfigPath(platform: Platform, env: Env, override?: string): string {
  const explicit = override || env[CONFIG_ENV];
  if (explicit) return platform.path.resolve(explicit);
  return platform.path.join(getStateDir(platform, env), CONFIG_FILE);
}

export function getDbPath(platform: Platform, env: Env): string {
  return platform.path.join(getStateDir(platform, env), DB_FILENAME);
}

export function getLogPath(platform: Platform, env: Env): string {
  return platform.path.join(getStateDir(platform, env), LOG_FILE);
}
