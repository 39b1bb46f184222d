/**
 * Logger factory
 *
 * JSON lines to stderr at the requested level, and to the rotated log file
 * at debug so past runs can be inspected after the fact.
 */

import pino from 'pino';
import type { DestinationStream, Level, Logger } from 'pino';
import type { LogLevel } from '@idlewipe/ipc';
import { errorMessage } from '../errors';
import { RotatingFileStream } from './rotating-stream';

export interface CreateLoggerOptions {
  /** Console level */
  level?: LogLevel;
  /** Rotated log file; omit for console only */
  logFile?: string;
  fileLevel?: Level;
  /** Console destination, stderr by default */
  console?: DestinationStream;
}

interface StreamEntry {
  level: Level;
  stream: DestinationStream;
}

function lowest(levels: Level[]): Level | 'silent' {
  let result: Level | 'silent' = 'silent';
  for (const level of levels) {
    if (result === 'silent' || pino.levels.values[level] < pino.levels.values[result]) {
      result = level;
    }
  }
  return result;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const streams: StreamEntry[] = [];

  if (level !== 'silent') {
    streams.push({ level, stream: options.console ?? pino.destination({ fd: 2, sync: true }) });
  }

  let fileError: unknown;
  if (options.logFile) {
    try {
      streams.push({ level: options.fileLevel ?? 'debug', stream: new RotatingFileStream({ filePath: options.logFile }) });
    } catch (error) {
      fileError = error;
    }
  }

  const logger = pino(
    { level: lowest(streams.map((s) => s.level)), base: { pid: process.pid } },
    pino.multistream(streams),
  );

  if (fileError !== undefined) {
    logger.warn({ logFile: options.logFile, err: errorMessage(fileError) }, 'Log file unavailable; logging to console only');
  }
  return logger;
}
