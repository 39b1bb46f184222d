import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { normalizePath, normalizePathList } from '../normalize-path';
import { posixPlatform, win32Platform } from '../platform';

const describePosix = process.platform === 'win32' ? describe.skip : describe;

describePosix('normalizePath (posix)', () => {
  let tmpDir: string;
  let realTmp: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'normalize-test-'));
    realTmp = fs.realpathSync(tmpDir);
  });

  afterEach(() => {
    try { fs.rmSync(tmpDir, { recursive: true, force: true }); } catch { /* */ }
  });

  const opts = (env: Record<string, string> = {}, cwd = '/') => ({ platform: posixPlatform, env, cwd });

  it('expands $VAR and ${VAR} references', () => {
    expect(normalizePath('$DATA/app/cache', opts({ DATA: tmpDir }))).toBe(path.join(realTmp, 'app', 'cache'));
    expect(normalizePath('${DATA}/app', opts({ DATA: tmpDir }))).toBe(path.join(realTmp, 'app'));
  });

  it('leaves unknown variables as written', () => {
    expect(normalizePath('$NOPE/x', opts({}, tmpDir))).toBe(path.join(realTmp, '$NOPE', 'x'));
  });

  it('expands the home shorthand', () => {
    expect(normalizePath('~/profile', opts({ HOME: tmpDir }))).toBe(path.join(realTmp, 'profile'));
    expect(normalizePath('~', opts({ HOME: tmpDir }))).toBe(
      path.join(fs.realpathSync(path.dirname(tmpDir)), path.basename(tmpDir)),
    );
  });

  it('resolves relative segments against the working directory', () => {
    expect(normalizePath('a/../b/c', opts({}, tmpDir))).toBe(path.join(realTmp, 'b', 'c'));
  });

  it('does not require the target to exist', () => {
    const result = normalizePath(path.join(tmpDir, 'missing', 'deeper', 'leaf'), opts());
    expect(result).toBe(path.join(realTmp, 'missing', 'deeper', 'leaf'));
  });

  it('resolves symlinked ancestors but keeps a symlinked final component', () => {
    const real = path.join(tmpDir, 'real');
    const link = path.join(tmpDir, 'link');
    fs.mkdirSync(real);
    fs.symlinkSync(real, link, 'dir');

    expect(normalizePath(link, opts())).toBe(path.join(realTmp, 'link'));
    expect(normalizePath(path.join(link, 'child'), opts())).toBe(path.join(realTmp, 'real', 'child'));
  });

  it('falls back to the expanded form when canonicalization fails', () => {
    const target = path.join(tmpDir, 'a', 'b');
    const result = normalizePath(target, {
      ...opts(),
      realpath: () => {
        throw new Error('ELOOP');
      },
    });
    expect(result).toBe(target);
  });

  it('normalizePathList keeps order', () => {
    expect(normalizePathList(['$D/one', '$D/two'], opts({ D: tmpDir }))).toEqual([
      path.join(realTmp, 'one'),
      path.join(realTmp, 'two'),
    ]);
  });
});

describe('normalizePath (win32)', () => {
  const opts = (env: Record<string, string>) => ({ platform: win32Platform, env, cwd: 'C:\\' });

  it('expands %VAR% case-insensitively and keeps the drive letter', () => {
    const result = normalizePath('%LOCALAPPDATA%\\Mozilla', opts({ LocalAppData: 'C:\\Users\\u\\AppData\\Local' }));
    expect(result).toBe('C:\\Users\\u\\AppData\\Local\\Mozilla');
  });

  it('expands the home shorthand with either separator', () => {
    expect(normalizePath('~\\AppData', opts({ USERPROFILE: 'D:\\Home' }))).toBe('D:\\Home\\AppData');
    expect(normalizePath('~/AppData', opts({ USERPROFILE: 'D:\\Home' }))).toBe('D:\\Home\\AppData');
  });

  it('preserves UNC roots', () => {
    expect(normalizePath('\\\\server\\share\\profiles\\..\\cache', opts({}))).toBe('\\\\server\\share\\cache');
  });
});
