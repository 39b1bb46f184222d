/**
 * Migration runner
 *
 * Applies pending migrations in order, one IMMEDIATE transaction per step.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { MigrationError } from '../errors';
import type { Migration, MigrationReport } from './types';
import { LaunchesSchemaMigration } from './001-launches-schema';
import { ImportLegacyStateMigration } from './002-import-legacy-state';

export type { Migration, MigrationReport };

const TABLE = '_migrations';

const VersionRowSchema = z.object({ version: z.number().int().nullable() });

export const ALL_MIGRATIONS: Migration[] = [
  new LaunchesSchemaMigration(),
  new ImportLegacyStateMigration(),
];

/**
 * Highest version a migration list knows about.
 */
export function latestVersion(migrations: readonly Migration[] = ALL_MIGRATIONS): number {
  return migrations.reduce((max, m) => Math.max(max, m.version), 0);
}

/**
 * Ensure the _migrations table exists.
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${TABLE} (
      version    INTEGER PRIMARY KEY,
      name       TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

/**
 * Get the DB schema version via PRAGMA user_version (fast, no table query).
 */
export function getDbVersion(db: Database.Database): number {
  return Number(db.pragma('user_version', { simple: true }) ?? 0);
}

function readTableVersion(db: Database.Database): number {
  const row = VersionRowSchema.parse(db.prepare(`SELECT MAX(version) AS version FROM ${TABLE}`).get());
  return row.version ?? 0;
}

/**
 * Get the current migration version (highest applied version).
 * Also syncs PRAGMA user_version if it diverges from the table version.
 */
export function getCurrentVersion(db: Database.Database): number {
  ensureMigrationsTable(db);
  const tableVersion = readTableVersion(db);

  if (getDbVersion(db) !== tableVersion) {
    db.pragma(`user_version = ${tableVersion}`);
  }

  return tableVersion;
}

/**
 * Bring the store up to the latest known version.
 *
 * A store whose version is above every known migration is left untouched and
 * reported as forward-incompatible. Each step commits on its own, so a
 * failing step keeps the ones before it and raises MigrationError.
 */
export function runMigrations(
  db: Database.Database,
  migrations: readonly Migration[] = ALL_MIGRATIONS,
): MigrationReport {
  const from = getCurrentVersion(db);
  const latest = latestVersion(migrations);

  if (from > latest) {
    return { from, to: from, applied: 0, forwardIncompatible: true };
  }

  const pending = migrations.filter((m) => m.version > from).sort((a, b) => a.version - b.version);
  if (pending.length === 0) {
    return { from, to: from, applied: 0, forwardIncompatible: false };
  }

  const insertMigration = db.prepare(`INSERT INTO ${TABLE} (version, name) VALUES (@version, @name)`);

  // Re-read the version under the write lock: another process may have
  // applied this step while we waited for it.
  const applyStep = db.transaction((migration: Migration): boolean => {
    if (readTableVersion(db) >= migration.version) return false;
    migration.up(db);
    insertMigration.run({ version: migration.version, name: migration.name });
    return true;
  });

  let applied = 0;
  for (const migration of pending) {
    try {
      if (!applyStep.immediate(migration)) continue;
      applied += 1;
      migration.afterCommit?.(db);
    } catch (error) {
      throw new MigrationError(migration.version, migration.name, error);
    }
  }

  const to = readTableVersion(db);
  db.pragma(`user_version = ${to}`);

  return { from, to, applied, forwardIncompatible: false };
}
