/**
 * Idle-usage tracker
 *
 * Records and reads the last launch instant per application. Every call
 * opens the store, brings its schema up to date, performs one operation and
 * closes it again, so separate invocations never share a connection.
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import { err, ok, systemClock } from '@idlewipe/ipc';
import type { Clock, LaunchRecord, Result } from '@idlewipe/ipc';
import { openDatabase, closeDatabase } from './database';
import { toStorageError } from './errors';
import type { StorageError } from './errors';
import { ALL_MIGRATIONS, latestVersion, runMigrations } from './migrations/index';
import type { Migration } from './migrations/types';
import { LaunchesRepository } from './repositories/launches';

export interface UsageTrackerOptions {
  dbPath: string;
  logger: Logger;
  clock?: Clock;
  migrations?: readonly Migration[];
  /** Milliseconds to wait for another invocation's write lock; defaults to 5 s */
  busyTimeout?: number;
}

export class UsageTracker {
  readonly dbPath: string;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly migrations: readonly Migration[];
  private readonly busyTimeout?: number;

  constructor(options: UsageTrackerOptions) {
    this.dbPath = options.dbPath;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.migrations = options.migrations ?? ALL_MIGRATIONS;
    this.busyTimeout = options.busyTimeout;
  }

  /** Store the clock's current instant as `appId`'s last launch. */
  recordLaunch(appId: string): Result<Date, StorageError> {
    const now = this.clock.now();
    return this.withLaunches('record launch', appId, (launches) => launches.upsert({ appId, lastLaunchAt: now }).lastLaunchAt);
  }

  readLastLaunch(appId: string): Result<Date | null, StorageError> {
    return this.withLaunches('read last launch', appId, (launches) => launches.get(appId)?.lastLaunchAt ?? null);
  }

  /**
   * Last launch of `appId`, or null when it was never recorded or the store
   * could not be read (the failure is logged).
   */
  getLastLaunch(appId: string): Date | null {
    const result = this.readLastLaunch(appId);
    return result.ok ? result.value : null;
  }

  listLaunches(): Result<LaunchRecord[], StorageError> {
    return this.withLaunches('list launches', undefined, (launches) => launches.list());
  }

  /** Remove the record for `appId`. Resolves to false when there was none. */
  forget(appId: string): Result<boolean, StorageError> {
    return this.withLaunches('forget launch', appId, (launches) => launches.delete(appId));
  }

  private withLaunches<T>(
    action: string,
    appId: string | undefined,
    operation: (launches: LaunchesRepository) => T,
  ): Result<T, StorageError> {
    let db: Database.Database | undefined;
    try {
      db = openDatabase(this.dbPath, { busyTimeout: this.busyTimeout });
      this.migrate(db);
      return ok(operation(new LaunchesRepository(db)));
    } catch (error) {
      const failure = toStorageError(error);
      const level = failure.code === 'MIGRATION_FAILED' ? 'error' : 'warn';
      this.logger[level]({ appId, store: this.dbPath, code: failure.code, err: failure }, `Failed to ${action}`);
      return err(failure);
    } finally {
      if (db) closeDatabase(db);
    }
  }

  private migrate(db: Database.Database): void {
    const report = runMigrations(db, this.migrations);
    if (report.forwardIncompatible) {
      this.logger.warn(
        { store: this.dbPath, storeVersion: report.from, knownVersion: latestVersion(this.migrations) },
        'Usage store was written by a newer version; continuing without migrating',
      );
    } else if (report.applied > 0) {
      this.logger.info({ store: this.dbPath, from: report.from, to: report.to }, 'Migrated usage store');
    }
  }
}
