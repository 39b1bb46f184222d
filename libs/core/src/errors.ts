/**
 * Error types for configuration and launching
 */

export type ConfigErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_UNREADABLE'
  | 'CONFIG_INVALID'
  | 'APP_UNKNOWN'
  | 'APP_INVALID';

/**
 * Configuration problem. File-level codes are fatal for the invocation;
 * `APP_*` codes concern one application and carry its id.
 */
export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly appId?: string;
  public readonly issues: unknown[];

  constructor(message: string, code: ConfigErrorCode, options: { appId?: string; issues?: unknown[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ConfigError';
    this.code = code;
    this.appId = options.appId;
    this.issues = options.issues ?? [];
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export type LaunchErrorCode = 'EXECUTABLE_NOT_FOUND' | 'SPAWN_FAILED';

export class LaunchError extends Error {
  public readonly code: LaunchErrorCode;
  public readonly appId: string;

  constructor(message: string, code: LaunchErrorCode, appId: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LaunchError';
    this.code = code;
    this.appId = appId;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** String code of a known error, for logs and batch results. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
