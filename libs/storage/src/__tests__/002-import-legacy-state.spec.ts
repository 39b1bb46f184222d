import Database from 'better-sqlite3';
import * as os from 'node:os';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { LaunchesSchemaMigration } from '../migrations/001-launches-schema';
import { ImportLegacyStateMigration } from '../migrations/002-import-legacy-state';
import { ALL_MIGRATIONS, runMigrations } from '../migrations/index';
import { MigrationError } from '../errors';

describe('002-import-legacy-state', () => {
  let dir: string;
  let legacyPath: string;
  let db: Database.Database;

  function launches(): unknown[] {
    return db.prepare('SELECT app_id, last_launch_at FROM launches ORDER BY app_id').all();
  }

  function importLegacy(): void {
    const migration = new ImportLegacyStateMigration();
    migration.up(db);
    migration.afterCommit(db);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'legacy-test-'));
    legacyPath = path.join(dir, 'state.json');
    db = new Database(path.join(dir, 'state.db'));
    new LaunchesSchemaMigration().up(db);
  });

  afterEach(() => {
    db.close();
    try { fs.rmSync(dir, { recursive: true, force: true }); } catch { /* */ }
  });

  it('does nothing without a legacy file', () => {
    importLegacy();

    expect(launches()).toEqual([]);
    expect(fs.readdirSync(dir).sort()).toEqual(['state.db']);
  });

  it('imports valid entries as UTC instants and retires the file', () => {
    fs.writeFileSync(legacyPath, JSON.stringify({
      apps: {
        browser: { last_launch: '2024-03-10T08:00:00.123456' },
        editor: { last_launch: '2024-03-11T09:30:00+02:00' },
        broken: { last_launch: 'yesterday' },
        odd: 'not-an-object',
      },
    }));

    importLegacy();

    expect(launches()).toEqual([
      { app_id: 'browser', last_launch_at: '2024-03-10T08:00:00.123Z' },
      { app_id: 'editor', last_launch_at: '2024-03-11T07:30:00.000Z' },
    ]);
    expect(fs.existsSync(legacyPath)).toBe(false);
    expect(fs.existsSync(`${legacyPath}.bak`)).toBe(true);
  });

  it('keeps the newer of the stored and imported instants', () => {
    db.prepare("INSERT INTO launches (app_id, last_launch_at) VALUES ('browser', '2024-06-01T00:00:00.000Z')").run();
    db.prepare("INSERT INTO launches (app_id, last_launch_at) VALUES ('editor', '2024-01-01T00:00:00.000Z')").run();
    fs.writeFileSync(legacyPath, JSON.stringify({
      apps: {
        browser: { last_launch: '2024-05-01T00:00:00' },
        editor: { last_launch: '2024-02-01T00:00:00' },
      },
    }));

    importLegacy();

    expect(launches()).toEqual([
      { app_id: 'browser', last_launch_at: '2024-06-01T00:00:00.000Z' },
      { app_id: 'editor', last_launch_at: '2024-02-01T00:00:00.000Z' },
    ]);
  });

  it('leaves a malformed file in place', () => {
    fs.writeFileSync(legacyPath, '{ "apps": ');

    importLegacy();

    expect(launches()).toEqual([]);
    expect(fs.readFileSync(legacyPath, 'utf-8')).toBe('{ "apps": ');
  });

  it('leaves a file without an apps map in place', () => {
    fs.writeFileSync(legacyPath, JSON.stringify({ version: 1 }));

    importLegacy();

    expect(fs.existsSync(legacyPath)).toBe(true);
  });

  it('keeps the file until the import is committed', () => {
    fs.writeFileSync(legacyPath, JSON.stringify({ apps: { browser: { last_launch: '2024-03-10T08:00:00' } } }));

    new ImportLegacyStateMigration().up(db);

    expect(fs.existsSync(legacyPath)).toBe(true);
    expect(fs.existsSync(`${legacyPath}.bak`)).toBe(false);
  });

  it('leaves the file for a retry when the step rolls back', () => {
    fs.writeFileSync(legacyPath, JSON.stringify({ apps: { browser: { last_launch: '2024-03-10T08:00:00' } } }));
    runMigrations(db, [new LaunchesSchemaMigration()]);
    db.exec(`
      CREATE TRIGGER block_import BEFORE INSERT ON _migrations WHEN NEW.version = 2
      BEGIN SELECT RAISE(ABORT, 'blocked'); END
    `);

    expect(() => runMigrations(db, ALL_MIGRATIONS)).toThrow(MigrationError);
    expect(launches()).toEqual([]);
    expect(fs.existsSync(legacyPath)).toBe(true);

    db.exec('DROP TRIGGER block_import');
    runMigrations(db, ALL_MIGRATIONS);

    expect(launches()).toEqual([{ app_id: 'browser', last_launch_at: '2024-03-10T08:00:00.000Z' }]);
    expect(fs.existsSync(legacyPath)).toBe(false);
    expect(fs.existsSync(`${legacyPath}.bak`)).toBe(true);
  });
});
