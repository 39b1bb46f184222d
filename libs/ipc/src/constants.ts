/**
 * Constants for idlewipe
 */

// Paths relative to the per-user state base directory
/** State directory name (holds the store, config and log) */
export const STATE_DIR = '.app_launch_tracker';

/** Configuration file name */
export const CONFIG_FILE = 'config.json';

/** Usage store file name */
export const DB_FILENAME = 'state.db';

/**
 * @deprecated Launch times now live in the SQLite store.
 * Retained so migration 002 can import and retire the legacy JSON file.
 */
export const LEGACY_STATE_FILE = 'state.json';

/** Log file name */
export const LOG_FILE = 'idlewipe.log';

/** Environment variable overriding the state directory */
export const HOME_ENV = 'IDLEWIPE_HOME';

/** Environment variable overriding the configuration file path */
export const CONFIG_ENV = 'IDLEWIPE_CONFIG';

/** Environment variable overriding the console log level */
export const LOG_LEVEL_ENV = 'IDLEWIPE_LOG_LEVEL';

/** Secure deletion defaults */
export const WIPE_DEFAULTS = {
  /** Overwrite passes per file */
  PASSES: 3,
  /** Bytes written per overwrite chunk (1 MiB) */
  CHUNK_SIZE: 1024 * 1024,
} as const;

/** Log rotation limits */
export const LOG_ROTATION = {
  MAX_FILE_SIZE: 10 * 1024 * 1024,
  MAX_FILES: 5,
} as const;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
