import Database from 'better-sqlite3';
import * as os from 'node:os';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { openDatabase, closeDatabase } from '../database';
import { APPLICATION_ID } from '../constants';
import { DatabaseTamperError } from '../errors';

describe('openDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'database-test-'));
  });

  afterEach(() => {
    try { fs.rmSync(dir, { recursive: true, force: true }); } catch { /* */ }
  });

  it('creates missing parent directories and stamps the application id', () => {
    const dbPath = path.join(dir, 'nested', 'state', 'state.db');

    const db = openDatabase(dbPath);
    try {
      expect(db.pragma('application_id', { simple: true })).toBe(APPLICATION_ID);
      expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
      expect(db.pragma('busy_timeout', { simple: true })).toBe(5000);
    } finally {
      closeDatabase(db);
    }
    expect(fs.existsSync(dbPath)).toBe(true);
  });

  it('restricts the file to its owner', () => {
    if (process.platform === 'win32') return;
    const dbPath = path.join(dir, 'state.db');

    closeDatabase(openDatabase(dbPath));

    expect(fs.statSync(dbPath).mode & 0o777).toBe(0o600);
  });

  it('reopens its own store', () => {
    const dbPath = path.join(dir, 'state.db');
    closeDatabase(openDatabase(dbPath));

    const db = openDatabase(dbPath);
    expect(db.open).toBe(true);
    closeDatabase(db);
  });

  it('refuses a SQLite file that belongs to something else', () => {
    const dbPath = path.join(dir, 'state.db');
    const foreign = new Database(dbPath);
    foreign.pragma('application_id = 1234');
    foreign.close();

    expect(() => openDatabase(dbPath)).toThrow(DatabaseTamperError);
  });

  it('closeDatabase tolerates an already-closed handle', () => {
    const db = openDatabase(path.join(dir, 'state.db'));
    closeDatabase(db);

    expect(() => closeDatabase(db)).not.toThrow();
  });
});
