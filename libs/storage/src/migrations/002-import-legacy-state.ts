/**
 * Migration 002: Import the legacy JSON state file
 *
 * Earlier releases kept launch times in `state.json` next to the database:
 *   { "apps": { "<id>": { "last_launch": "<iso>" } } }
 * Valid entries are merged into `launches` (the newer instant wins) and,
 * once that has committed, the file is renamed to `state.json.bak`. A file
 * that cannot be read or parsed is left where it is.
 */

import type Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { LEGACY_STATE_FILE } from '@idlewipe/ipc';
import { parseInstant } from '../instant';
import type { Migration } from './types';

const LegacyStateSchema = z.object({
  apps: z.record(z.string().min(1), z.unknown()),
});

const LegacyEntrySchema = z.looseObject({
  last_launch: z.string(),
});

const IMPORT_LAUNCH = `
  INSERT INTO launches (app_id, last_launch_at)
  VALUES (@app_id, @last_launch_at)
  ON CONFLICT(app_id) DO UPDATE SET last_launch_at = excluded.last_launch_at
  WHERE excluded.last_launch_at > launches.last_launch_at`;

function readLegacyState(filePath: string): z.infer<typeof LegacyStateSchema> | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
  try {
    const parsed = LegacyStateSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    // not JSON
    return null;
  }
}

function legacyPathFor(db: Database.Database): string {
  return path.join(path.dirname(db.name), LEGACY_STATE_FILE);
}

export class ImportLegacyStateMigration implements Migration {
  readonly version = 2;
  readonly name = '002-import-legacy-state';

  up(db: Database.Database): void {
    if (db.memory) return;

    const legacy = readLegacyState(legacyPathFor(db));
    if (!legacy) return;

    const insert = db.prepare(IMPORT_LAUNCH);
    for (const [appId, value] of Object.entries(legacy.apps)) {
      const entry = LegacyEntrySchema.safeParse(value);
      if (!entry.success) continue;
      const at = parseInstant(entry.data.last_launch);
      if (Number.isNaN(at.getTime())) continue;
      insert.run({ app_id: appId, last_launch_at: at.toISOString() });
    }
  }

  /** Retire the file only after its rows are committed, so a rolled-back import is retried. */
  afterCommit(db: Database.Database): void {
    if (db.memory) return;
    const legacyPath = legacyPathFor(db);
    if (readLegacyState(legacyPath)) {
      fs.renameSync(legacyPath, `${legacyPath}.bak`);
    }
  }
}
