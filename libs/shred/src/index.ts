/**
 * Secure deletion, path normalization and platform capabilities
 *
 * @packageDocumentation
 */

export { SecureDeleter, EntryChangedError, errnoCode } from './secure-delete';
export type { SecureDeleterOptions } from './secure-delete';
export { normalizePath, normalizePathList } from './normalize-path';
export type { NormalizeOptions } from './normalize-path';
export { getPlatform, posixPlatform, win32Platform } from './platform';
export type { Env, Platform, PlatformKind } from './platform';
