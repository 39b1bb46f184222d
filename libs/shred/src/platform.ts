/**
 * Platform capabilities
 *
 * Everything that differs between Windows-like and POSIX hosts (home
 * directory, state location, variable syntax, executable lookup) lives
 * behind this interface so the rest of the code never checks
 * `process.platform` itself.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export type PlatformKind = 'posix' | 'win32';

export type Env = Record<string, string | undefined>;

export interface Platform {
  readonly kind: PlatformKind;
  /** Path flavour matching the platform (drive letters and UNC roots on win32) */
  readonly path: path.PlatformPath;
  homeDir(env: Env): string;
  /** Base directory for per-user state: APPDATA on win32, home elsewhere */
  stateBaseDir(env: Env): string;
  /** Expand environment references; unknown variables are left as written */
  expandEnv(value: string, env: Env): string;
  /** Resolve a command name to an executable file, or null */
  findExecutable(name: string, env: Env): string | null;
}

const POSIX_VAR = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;
const WIN32_VAR = /%([^%]+)%/g;

function isExecutableFile(candidate: string, requireExecBit: boolean): boolean {
  try {
    const stat = fs.statSync(candidate);
    if (!stat.isFile()) return false;
    if (requireExecBit) fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function lookupCaseInsensitive(env: Env, name: string): string | undefined {
  const upper = name.toUpperCase();
  for (const [key, value] of Object.entries(env)) {
    if (key.toUpperCase() === upper) return value;
  }
  return undefined;
}

export const posixPlatform: Platform = {
  kind: 'posix',
  path: path.posix,

  homeDir(env) {
    return env['HOME'] || os.homedir();
  },

  stateBaseDir(env) {
    return this.homeDir(env);
  },

  expandEnv(value, env) {
    return value.replace(POSIX_VAR, (match, braced?: string, bare?: string) => {
      const name = braced ?? bare ?? '';
      const resolved = env[name];
      return resolved === undefined ? match : resolved;
    });
  },

  findExecutable(name, env) {
    if (name.includes('/')) {
      const candidate = path.posix.resolve(name);
      return isExecutableFile(candidate, true) ? candidate : null;
    }
    for (const dir of (env['PATH'] ?? '').split(':')) {
      if (!dir) continue;
      const candidate = path.posix.join(dir, name);
      if (isExecutableFile(candidate, true)) return candidate;
    }
    return null;
  },
};

export const win32Platform: Platform = {
  kind: 'win32',
  path: path.win32,

  homeDir(env) {
    return lookupCaseInsensitive(env, 'USERPROFILE') || os.homedir();
  },

  stateBaseDir(env) {
    return lookupCaseInsensitive(env, 'APPDATA') || this.homeDir(env);
  },

  expandEnv(value, env) {
    const percentExpanded = value.replace(WIN32_VAR, (match, name: string) => {
      const resolved = lookupCaseInsensitive(env, name);
      return resolved === undefined ? match : resolved;
    });
    return percentExpanded.replace(POSIX_VAR, (match, braced?: string, bare?: string) => {
      const resolved = lookupCaseInsensitive(env, braced ?? bare ?? '');
      return resolved === undefined ? match : resolved;
    });
  },

  findExecutable(name, env) {
    const extensions = (lookupCaseInsensitive(env, 'PATHEXT') ?? '.COM;.EXE;.BAT;.CMD')
      .split(';')
      .filter(Boolean);
    const withExtensions = (base: string): string[] =>
      path.win32.extname(base) ? [base] : [base, ...extensions.map((ext) => base + ext)];

    if (name.includes('\\') || name.includes('/')) {
      return withExtensions(path.win32.resolve(name)).find((c) => isExecutableFile(c, false)) ?? null;
    }
    for (const dir of (lookupCaseInsensitive(env, 'PATH') ?? '').split(';')) {
      if (!dir) continue;
      const found = withExtensions(path.win32.join(dir, name)).find((c) => isExecutableFile(c, false));
      if (found) return found;
    }
    return null;
  },
};

/**
 * Pick the implementation for a Node platform identifier.
 */
export function getPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
  return nodePlatform === 'win32' ? win32Platform : posixPlatform;
}
