/**
 * Storage error types
 */

export type StorageErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'STORE_BUSY'
  | 'STORE_CORRUPT'
  | 'MIGRATION_FAILED'
  | 'DATABASE_TAMPERED'
  | 'VALIDATION_FAILED';

export class StorageError extends Error {
  public readonly code: StorageErrorCode;

  constructor(message: string, code: StorageErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * The store could not be opened, read or written. `STORE_BUSY` means another
 * process held the lock past the busy timeout.
 */
export class StoreError extends StorageError {
  constructor(message: string, code: 'STORE_UNAVAILABLE' | 'STORE_BUSY' | 'STORE_CORRUPT' = 'STORE_UNAVAILABLE', options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'StoreError';
  }
}

export class MigrationError extends StorageError {
  public readonly version: number;
  public readonly migrationName: string;

  constructor(version: number, migrationName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Migration ${migrationName} (v${version}) failed: ${reason}`, 'MIGRATION_FAILED', { cause });
    this.name = 'MigrationError';
    this.version = version;
    this.migrationName = migrationName;
  }
}

export class DatabaseTamperError extends StorageError {
  constructor(message = 'Database file has an unexpected application_id; it is not a usage store.') {
    super(message, 'DATABASE_TAMPERED');
    this.name = 'DatabaseTamperError';
  }
}

export class ValidationError extends StorageError {
  public readonly issues: unknown[];

  constructor(message: string, issues: unknown[] = []) {
    super(message, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map anything thrown by better-sqlite3 or the filesystem to a StorageError.
 */
export function toStorageError(error: unknown): StorageError {
  if (error instanceof StorageError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const code = sqliteCode(error) ?? '';
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) {
    return new StoreError(`Usage store is locked by another process: ${message}`, 'STORE_BUSY', { cause: error });
  }
  if (code.startsWith('SQLITE_CORRUPT') || code === 'SQLITE_NOTADB') {
    return new StoreError(`Usage store is corrupt: ${message}`, 'STORE_CORRUPT', { cause: error });
  }
  return new StoreError(`Usage store unavailable: ${message}`, 'STORE_UNAVAILABLE', { cause: error });
}
