/**
 * Storage constants
 */

export const DB_PRAGMAS = {
  JOURNAL_MODE: 'WAL',
  /** Milliseconds a writer waits on another process's lock before SQLITE_BUSY */
  BUSY_TIMEOUT: 5000,
} as const;

export const FILE_PERMISSIONS = {
  DB_FILE: 0o600,
  DB_DIR: 0o700,
} as const;

/** SQLite application_id identifying a usage store ("IDLW" in hex). */
export const APPLICATION_ID = 0x49444c57;
