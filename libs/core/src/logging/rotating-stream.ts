/**
 * Size-rotated log file
 *
 * Synchronous pino destination: each line is written before the call
 * returns, so nothing is lost when a short-lived invocation exits. When the
 * next line would push the file past `maxFileSize` it is rotated to `.1`,
 * older generations shift up and the oldest is dropped.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DestinationStream } from 'pino';
import { LOG_ROTATION } from '@idlewipe/ipc';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Rename `from` to `to`, or unlink it when `to` is null. A missing source is not an error. */
function moveAside(from: string, to: string | null): void {
  try {
    if (to === null) {
      fs.unlinkSync(from);
    } else {
      fs.renameSync(from, to);
    }
  } catch (error) {
    if (!isMissing(error)) throw error;
  }
}

export interface RotatingFileStreamOptions {
  filePath: string;
  maxFileSize?: number;
  /** Generations kept, counting the live file */
  maxFiles?: number;
}

export class RotatingFileStream implements DestinationStream {
  readonly filePath: string;
  private readonly maxFileSize: number;
  private readonly maxFiles: number;
  private fd: number | null = null;
  private currentSize = 0;
  /** Lines lost to write or rotation failures */
  droppedLines = 0;
  lastError: unknown;

  constructor(options: RotatingFileStreamOptions) {
    this.filePath = options.filePath;
    this.maxFileSize = options.maxFileSize ?? LOG_ROTATION.MAX_FILE_SIZE;
    this.maxFiles = options.maxFiles ?? LOG_ROTATION.MAX_FILES;
    this.open();
  }

  /**
   * Append one line. Never throws: a line that cannot be written (another
   * process removed the directory, the disk is full) is counted in
   * `droppedLines` and the file is reopened on the next write.
   */
  write(line: string): void {
    const bytes = Buffer.byteLength(line);
    try {
      if (this.currentSize > 0 && this.currentSize + bytes > this.maxFileSize) {
        this.rotate();
      }
      fs.writeSync(this.open(), line);
      this.currentSize += bytes;
    } catch (error) {
      this.droppedLines += 1;
      this.lastError = error;
      this.release();
    }
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  private open(): number {
    if (this.fd !== null) return this.fd;

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    const fd = fs.openSync(this.filePath, 'a', 0o600);
    this.currentSize = fs.fstatSync(fd).size;
    this.fd = fd;
    return fd;
  }

  /** Forget the descriptor after a failure; closing it may fail too. */
  private release(): void {
    const fd = this.fd;
    this.fd = null;
    if (fd === null) return;
    try {
      fs.closeSync(fd);
    } catch (error) {
      this.lastError = error;
    }
  }

  private rotate(): void {
    this.close();

    // Shift .1 → .2 … and drop the oldest generation. A generation another
    // process already moved is skipped.
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${this.filePath}.${i}`;
      moveAside(oldPath, i === this.maxFiles - 1 ? null : `${this.filePath}.${i + 1}`);
    }

    moveAside(this.filePath, this.maxFiles > 1 ? `${this.filePath}.1` : null);
    this.currentSize = 0;
  }
}
