/**
 * Secure deletion engine
 *
 * Overwrites regular files with random bytes a number of times, forcing each
 * pass to disk, then unlinks them. Directories are emptied bottom-up before
 * they are removed. Symlinks are unlinked and never followed.
 *
 * Every entry is opened without following links and checked against the
 * device and inode seen by `lstat`, so an entry swapped for a link (or for
 * another file) between the check and the use is reported, not followed.
 *
 * Failures on individual entries are logged, recorded in the report and
 * skipped; `destroy` itself never throws. This is a best-effort overwrite:
 * it cannot defeat wear levelling on flash storage.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { WIPE_DEFAULTS } from '@idlewipe/ipc';
import type { DestroyFailure, DestroyReport, TargetKind, WipeEvent, WipeOperation } from '@idlewipe/ipc';

export interface SecureDeleterOptions {
  logger: Logger;
  /** Default overwrite passes when `destroy` is called without one */
  passes?: number;
  /** Bytes written per chunk */
  chunkSize?: number;
  /** Observer for every pass, removal and failure, in order */
  onEvent?: (event: WipeEvent) => void;
}

type Lookup =
  | { state: 'absent' }
  | { state: 'present'; stat: fs.Stats }
  | { state: 'failed' };

const OWNER_RW = 0o600;
const OWNER_RWX = 0o700;

// Absent on win32, where the pre/post lstat comparison is the only check
const O_NOFOLLOW = fs.constants.O_NOFOLLOW ?? 0;
const O_DIRECTORY = fs.constants.O_DIRECTORY ?? 0;

/** The entry at a path is no longer the one that was inspected. */
export class EntryChangedError extends Error {
  readonly code = 'ECHANGED';

  constructor(target: string) {
    super(`${target} changed while it was being destroyed`);
    this.name = 'EntryChangedError';
    Error.captureStackTrace(this, this.constructor);
  }
}

function sameEntry(a: fs.Stats, b: fs.Stats): boolean {
  return a.dev === b.dev && a.ino === b.ino;
}

/** True when `target` is still, and still not a link to, the entry `expected` described. */
function unchanged(target: string, expected: fs.Stats): boolean {
  try {
    const current = fs.lstatSync(target);
    return !current.isSymbolicLink() && sameEntry(current, expected);
  } catch {
    return false;
  }
}

/**
 * Open without following a final link and confirm the descriptor refers to
 * the inspected entry.
 */
function openVerified(target: string, flags: number, expected: fs.Stats): number {
  const fd = fs.openSync(target, flags | O_NOFOLLOW);
  if (!sameEntry(fs.fstatSync(fd), expected)) {
    fs.closeSync(fd);
    throw new EntryChangedError(target);
  }
  return fd;
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function classify(stat: fs.Stats): TargetKind {
  // Link check first: a link to a directory must never be recursed into
  if (stat.isSymbolicLink()) return 'symlink';
  if (stat.isDirectory()) return 'directory';
  if (stat.isFile()) return 'file';
  return 'other';
}

export class SecureDeleter {
  private readonly logger: Logger;
  private readonly passes: number;
  private readonly chunkSize: number;
  private readonly onEvent?: (event: WipeEvent) => void;

  constructor(options: SecureDeleterOptions) {
    this.logger = options.logger;
    this.passes = options.passes ?? WIPE_DEFAULTS.PASSES;
    this.chunkSize = options.chunkSize ?? WIPE_DEFAULTS.CHUNK_SIZE;
    this.onEvent = options.onEvent;

    if (!Number.isInteger(this.passes) || this.passes < 1) {
      throw new RangeError(`passes must be a positive integer, got ${this.passes}`);
    }
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
  }

  /**
   * Irreversibly remove the file, link or directory tree at `target`.
   * A missing path is a no-op.
   */
  destroy(target: string, passes: number = this.passes): DestroyReport {
    const report: DestroyReport = {
      path: target,
      kind: 'missing',
      removed: false,
      entriesRemoved: 0,
      filesOverwritten: 0,
      bytesOverwritten: 0,
      failures: [],
    };

    const passCount = Number.isInteger(passes) && passes >= 1 ? passes : this.passes;
    const found = this.lookup(target, report);
    if (found.state === 'present') {
      report.kind = classify(found.stat);
      this.destroyEntry(target, found.stat, passCount, report);
    } else if (found.state === 'failed') {
      report.kind = 'other';
    }

    report.removed = this.lookup(target, null).state === 'absent';

    if (report.failures.length > 0) {
      this.logger.warn(
        { path: target, failures: report.failures.length, removed: report.removed },
        'Secure delete finished with failures',
      );
    } else if (report.kind !== 'missing') {
      this.logger.debug(
        { path: target, entries: report.entriesRemoved, bytes: report.bytesOverwritten },
        'Secure delete finished',
      );
    }
    return report;
  }

  /** Destroy each path in order; one failure never stops the next. */
  destroyAll(targets: readonly string[], passes?: number): DestroyReport[] {
    return targets.map((target) => this.destroy(target, passes));
  }

  private destroyEntry(entryPath: string, stat: fs.Stats, passes: number, report: DestroyReport): void {
    switch (classify(stat)) {
      case 'symlink':
        this.unlink(entryPath, 'link:removed', report);
        return;
      case 'directory':
        this.destroyDirectory(entryPath, stat, passes, report);
        return;
      case 'file':
        this.destroyFile(entryPath, stat, passes, report);
        return;
      default:
        // FIFOs, sockets and device nodes are unlinked without being opened
        this.unlink(entryPath, 'other:removed', report);
    }
  }

  private destroyFile(file: string, stat: fs.Stats, passes: number, report: DestroyReport): void {
    this.restorePermissions(file, stat, OWNER_RW, report);

    let fd: number;
    try {
      fd = openVerified(file, fs.constants.O_RDWR, stat);
    } catch (error) {
      this.fail(report, file, 'overwrite', error);
      return;
    }

    try {
      report.bytesOverwritten += this.overwrite(fd, file, passes);
      report.filesOverwritten += 1;
    } catch (error) {
      // Leave the file in place rather than unlink content that was never overwritten
      this.fail(report, file, 'overwrite', error);
      return;
    } finally {
      fs.closeSync(fd);
    }

    this.unlink(file, 'file:removed', report);
  }

  private destroyDirectory(dir: string, stat: fs.Stats, passes: number, report: DestroyReport): void {
    this.restorePermissions(dir, stat, OWNER_RWX, report);

    let names: string[] = [];
    try {
      names = this.list(dir, stat);
    } catch (error) {
      this.fail(report, dir, 'readdir', error);
      // A directory replaced by something else is left to whoever replaced it
      const code = errnoCode(error);
      if (error instanceof EntryChangedError || code === 'ELOOP' || code === 'ENOTDIR') return;
    }

    for (const name of names) {
      if (!unchanged(dir, stat)) {
        this.fail(report, dir, 'readdir', new EntryChangedError(dir));
        return;
      }
      const child = path.join(dir, name);
      const found = this.lookup(child, report);
      if (found.state === 'present') {
        this.destroyEntry(child, found.stat, passes, report);
      }
    }

    try {
      fs.rmdirSync(dir);
      report.entriesRemoved += 1;
      this.emit({ type: 'dir:removed', path: dir });
    } catch (error) {
      this.fail(report, dir, 'rmdir', error);
    }
  }

  /**
   * List a directory after confirming it is the inspected one, and confirm
   * again afterwards so names read through a swapped-in link are discarded.
   */
  private list(dir: string, stat: fs.Stats): string[] {
    if (O_DIRECTORY !== 0) {
      fs.closeSync(openVerified(dir, fs.constants.O_RDONLY | O_DIRECTORY, stat));
    } else if (!unchanged(dir, stat)) {
      throw new EntryChangedError(dir);
    }

    const names = fs.readdirSync(dir);
    if (!unchanged(dir, stat)) throw new EntryChangedError(dir);
    return names;
  }

  /**
   * Overwrite the whole file behind `fd` `passes` times. The length of each
   * pass is taken once at its start. Returns the total bytes written.
   */
  private overwrite(fd: number, file: string, passes: number): number {
    const initialSize = fs.fstatSync(fd).size;
    const buffer = Buffer.allocUnsafe(Math.max(1, Math.min(this.chunkSize, initialSize)));
    let total = 0;

    for (let pass = 1; pass <= passes; pass++) {
      const length = fs.fstatSync(fd).size;
      let offset = 0;
      while (offset < length) {
        const size = Math.min(buffer.length, length - offset);
        crypto.randomFillSync(buffer, 0, size);
        let written = 0;
        while (written < size) {
          written += fs.writeSync(fd, buffer, written, size - written, offset + written);
        }
        offset += size;
      }
      fs.fsyncSync(fd);
      total += length;
      this.emit({ type: 'pass:completed', path: file, pass, passes, bytes: length });
    }

    return total;
  }

  private unlink(entryPath: string, event: 'file:removed' | 'link:removed' | 'other:removed', report: DestroyReport): void {
    try {
      fs.unlinkSync(entryPath);
      report.entriesRemoved += 1;
      this.emit({ type: event, path: entryPath });
    } catch (error) {
      this.fail(report, entryPath, 'unlink', error);
    }
  }

  /**
   * Add the owner bits an operation needs (rw for files, rwx for
   * directories). On win32 this clears the read-only attribute.
   *
   * The mode is changed through a verified descriptor; an entry that cannot
   * even be opened for reading is changed by path once `lstat` still shows
   * the same entry.
   */
  private restorePermissions(target: string, stat: fs.Stats, required: number, report: DestroyReport): void {
    if ((stat.mode & required) === required) return;
    const mode = (stat.mode & 0o7777) | required;
    const flags = stat.isDirectory() ? fs.constants.O_RDONLY | O_DIRECTORY : fs.constants.O_RDONLY;

    try {
      let fd: number | undefined;
      try {
        fd = openVerified(target, flags, stat);
      } catch (error) {
        const code = errnoCode(error);
        // win32 cannot open a directory at all
        if (code !== 'EACCES' && code !== 'EPERM' && code !== 'EISDIR') throw error;
      }

      if (fd === undefined) {
        if (!unchanged(target, stat)) throw new EntryChangedError(target);
        fs.chmodSync(target, mode);
        return;
      }
      try {
        fs.fchmodSync(fd, mode);
      } finally {
        fs.closeSync(fd);
      }
    } catch (error) {
      this.fail(report, target, 'chmod', error);
    }
  }

  /** lstat with ENOENT/ENOTDIR mapped to absent; other errors are recorded when a report is given. */
  private lookup(target: string, report: DestroyReport | null): Lookup {
    try {
      return { state: 'present', stat: fs.lstatSync(target) };
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') return { state: 'absent' };
      if (report) this.fail(report, target, 'stat', error);
      return { state: 'failed' };
    }
  }

  private fail(report: DestroyReport, target: string, operation: WipeOperation, error: unknown): void {
    const failure: DestroyFailure = {
      path: target,
      operation,
      code: errnoCode(error),
      message: error instanceof Error ? error.message : String(error),
    };
    report.failures.push(failure);
    this.logger.warn({ path: target, operation, code: failure.code, err: failure.message }, `Failed to ${operation} ${target}`);
    this.emit({ type: 'entry:failed', failure });
  }

  private emit(event: WipeEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      this.logger.warn({ event: event.type, err: error }, 'Wipe event observer threw');
    }
  }
}
