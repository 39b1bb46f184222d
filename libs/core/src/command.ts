/**
 * Command line normalization
 *
 * A configured `cmd` may be an argv list or a single command line. Command
 * lines are split the way the platform's shell would: POSIX quoting with
 * backslash escapes, or Windows double quotes with literal backslashes.
 */

import type { CommandSpec } from '@idlewipe/ipc';
import type { PlatformKind } from '@idlewipe/shred';

export type Argv = [string, ...string[]];

/** Escapable characters inside POSIX double quotes */
const DQUOTE_ESCAPES = new Set(['"', '\\', '$', '`', '\n']);

function splitPosix(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && DQUOTE_ESCAPES.has(line.charAt(i + 1))) {
        current += line.charAt(++i);
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '\\') {
      if (i + 1 >= line.length) throw new SyntaxError('No escaped character after trailing backslash');
      current += line.charAt(++i);
      inWord = true;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) throw new SyntaxError(`No closing quotation (${quote})`);
  if (inWord) words.push(current);
  return words;
}

function splitWindows(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (ch === '"') {
      quoted = !quoted;
      inWord = true;
    } else if (!quoted && /\s/.test(ch)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quoted) throw new SyntaxError('No closing quotation (")');
  if (inWord) words.push(current);
  return words;
}

/**
 * Split a command line into words. Throws SyntaxError on unbalanced quotes.
 */
export function splitCommandLine(line: string, kind: PlatformKind): string[] {
  return kind === 'win32' ? splitWindows(line) : splitPosix(line);
}

/**
 * Turn a configured command into an argv whose first element is the
 * executable. Returns null when nothing is left to run.
 */
export function normalizeCommand(spec: CommandSpec, kind: PlatformKind): Argv | null {
  const words = typeof spec === 'string' ? splitCommandLine(spec, kind) : [...spec];
  const [executable, ...args] = words;
  if (executable === undefined || executable === '') return null;
  return [executable, ...args];
}
