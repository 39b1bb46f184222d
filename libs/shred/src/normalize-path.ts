/**
 * Path normalization for configured cleanup paths
 *
 * Turns a configured path expression into an absolute path. Targets usually
 * do not exist yet when this runs, so nothing here requires the path to
 * exist and nothing throws.
 */

import * as fs from 'node:fs';
import type { Env, Platform } from './platform';

export interface NormalizeOptions {
  platform: Platform;
  env: Env;
  /** Base for relative paths */
  cwd: string;
  /** Overridable for tests; defaults to fs.realpathSync.native */
  realpath?: (p: string) => string;
}

function expandHome(value: string, platform: Platform, env: Env): string {
  if (value === '~') return platform.homeDir(env);
  const separators = platform.kind === 'win32' ? ['/', '\\'] : ['/'];
  if (value.startsWith('~') && separators.includes(value.charAt(1))) {
    return platform.path.join(platform.homeDir(env), value.slice(2));
  }
  return value;
}

/**
 * Canonicalize the deepest existing ancestor of the parent directory. The
 * last component is kept as written so a symlink named as a target is still
 * seen (and removed) as a link rather than swapped for what it points to.
 */
function canonicalize(absolute: string, options: NormalizeOptions): string {
  const p = options.platform.path;
  const realpath = options.realpath ?? fs.realpathSync.native;

  const parent = p.dirname(absolute);
  if (parent === absolute) return absolute;

  const missing: string[] = [p.basename(absolute)];
  let existing = parent;
  while (!fs.existsSync(existing)) {
    const up = p.dirname(existing);
    if (up === existing) return absolute;
    missing.unshift(p.basename(existing));
    existing = up;
  }

  return p.join(realpath(existing), ...missing);
}

/**
 * Normalize one configured path expression into an absolute path.
 * Falls back to the expanded, absolute but unresolved form when
 * canonicalization fails.
 */
export function normalizePath(expression: string, options: NormalizeOptions): string {
  const { platform, env, cwd } = options;
  const expanded = expandHome(platform.expandEnv(expression, env), platform, env);
  const absolute = platform.path.resolve(cwd, expanded);

  try {
    return canonicalize(absolute, options);
  } catch {
    // symlink loop or unreadable ancestor
    return absolute;
  }
}

export function normalizePathList(expressions: readonly string[], options: NormalizeOptions): string[] {
  return expressions.map((expression) => normalizePath(expression, options));
}
