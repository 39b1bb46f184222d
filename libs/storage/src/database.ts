/**
 * Database connection management
 *
 * Wraps better-sqlite3 with pragmas, file permissions, and lifecycle management.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { DB_PRAGMAS, FILE_PERMISSIONS, APPLICATION_ID } from './constants';
import { DatabaseTamperError } from './errors';

export interface OpenDatabaseOptions {
  /** application_id a store must carry (stamped on fresh files) */
  expectedAppId?: number;
  /** Milliseconds to wait on another connection's lock */
  busyTimeout?: number;
}

/**
 * Open (or create) a SQLite database with proper pragmas and file permissions.
 */
export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Database.Database {
  const expectedAppId = options.expectedAppId ?? APPLICATION_ID;
  const busyTimeout = options.busyTimeout ?? DB_PRAGMAS.BUSY_TIMEOUT;
  const dir = path.dirname(dbPath);

  // Ensure parent directory exists with restricted permissions
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: FILE_PERMISSIONS.DB_DIR });
  }

  const db = new Database(dbPath);

  try {
    // Concurrent invocations wait up to busyTimeout for each other's write locks
    db.pragma(`busy_timeout = ${busyTimeout}`);

    // Verify or set application_id before anything is written, so a foreign
    // SQLite file is left exactly as it was
    const appId = Number(db.pragma('application_id', { simple: true }));
    if (appId !== 0 && appId !== expectedAppId) {
      throw new DatabaseTamperError(
        `Database application_id mismatch: expected 0x${expectedAppId.toString(16).toUpperCase()}, got 0x${appId.toString(16).toUpperCase()}. ${dbPath} is not a usage store.`,
      );
    }

    db.pragma(`journal_mode = ${DB_PRAGMAS.JOURNAL_MODE}`);
    if (appId === 0) {
      db.pragma(`application_id = ${expectedAppId}`);
    }
  } catch (error) {
    db.close();
    throw error;
  }

  // Restrict file permissions
  try {
    fs.chmodSync(dbPath, FILE_PERMISSIONS.DB_FILE);
  } catch {
    // Not supported on every filesystem (e.g. Windows); the store still works
  }

  return db;
}

/**
 * Close a database connection. Closing an already-closed handle is a no-op.
 */
export function closeDatabase(db: Database.Database): void {
  if (db.open) db.close();
}
