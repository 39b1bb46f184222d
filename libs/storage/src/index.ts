/**
 * idlewipe usage store
 *
 * SQLite-backed record of the last launch of each application, with
 * versioned migrations.
 *
 * @packageDocumentation
 */

// Tracker
export { UsageTracker } from './tracker';
export type { UsageTrackerOptions } from './tracker';

// Errors
export { StorageError, StoreError, MigrationError, DatabaseTamperError, ValidationError, toStorageError } from './errors';
export type { StorageErrorCode } from './errors';

// Constants
export { APPLICATION_ID, DB_PRAGMAS } from './constants';

// Database
export { openDatabase, closeDatabase } from './database';
export type { OpenDatabaseOptions } from './database';
export { parseInstant } from './instant';

// Repositories
export { BaseRepository } from './repositories/base.repository';
export { LaunchesRepository } from './repositories/launches';

// Migrations
export { ALL_MIGRATIONS, runMigrations, getCurrentVersion, getDbVersion, latestVersion } from './migrations/index';
export type { Migration, MigrationReport } from './migrations/types';
