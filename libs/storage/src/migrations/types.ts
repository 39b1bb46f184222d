/**
 * Migration system types
 */

import type Database from 'better-sqlite3';

export interface Migration {
  readonly version: number;
  readonly name: string;
  up(db: Database.Database): void;
  /** Runs once the step's transaction has committed; file-system side effects go here */
  afterCommit?(db: Database.Database): void;
}

export interface MigrationReport {
  /** Version found in the store before running */
  from: number;
  /** Version the store is at afterwards */
  to: number;
  /** Steps applied by this call */
  applied: number;
  /** The store was written by a newer build; nothing was migrated */
  forwardIncompatible: boolean;
}
