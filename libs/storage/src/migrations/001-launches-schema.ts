/**
 * Migration 001: Launches table
 *
 * One row per application holding the instant it was last launched.
 *
 * Stores written by earlier releases already have a `launches` table keyed
 * by `app_name` with a `last_launch_iso` column, plus their own
 * `schema_version` table. Those rows are carried over into the current
 * layout and the old tables are dropped.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { parseInstant } from '../instant';
import type { Migration } from './types';

const ColumnInfoSchema = z.array(z.looseObject({ name: z.string() }));

const EarlierLaunchRowSchema = z.object({
  app_name: z.string().min(1),
  last_launch_iso: z.string(),
});

const CREATE_LAUNCHES = `
  CREATE TABLE IF NOT EXISTS launches (
    app_id         TEXT PRIMARY KEY,
    last_launch_at TEXT NOT NULL
  )`;

function columnsOf(db: Database.Database, table: string): string[] {
  return ColumnInfoSchema.parse(db.pragma(`table_info(${table})`)).map((column) => column.name);
}

/**
 * True when `launches` has the earlier `app_name`/`last_launch_iso` layout.
 */
export function hasEarlierLayout(db: Database.Database): boolean {
  const columns = columnsOf(db, 'launches');
  return columns.includes('app_name') && columns.includes('last_launch_iso');
}

function convertEarlierLayout(db: Database.Database): void {
  db.exec('ALTER TABLE launches RENAME TO launches_earlier');
  db.exec(CREATE_LAUNCHES);

  const insert = db.prepare('INSERT INTO launches (app_id, last_launch_at) VALUES (@app_id, @last_launch_at)');
  for (const raw of db.prepare('SELECT app_name, last_launch_iso FROM launches_earlier').all()) {
    const row = EarlierLaunchRowSchema.safeParse(raw);
    if (!row.success) continue;
    const at = parseInstant(row.data.last_launch_iso);
    if (Number.isNaN(at.getTime())) continue;
    insert.run({ app_id: row.data.app_name, last_launch_at: at.toISOString() });
  }

  db.exec('DROP TABLE launches_earlier');
  db.exec('DROP TABLE IF EXISTS schema_version');
}

export class LaunchesSchemaMigration implements Migration {
  readonly version = 1;
  readonly name = '001-launches-schema';

  up(db: Database.Database): void {
    if (hasEarlierLayout(db)) {
      convertEarlierLayout(db);
      return;
    }
    db.exec(CREATE_LAUNCHES);
  }
}
