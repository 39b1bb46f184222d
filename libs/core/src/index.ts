/**
 * idlewipe core
 *
 * Configuration, logging, the idle decision policy and the launch/task
 * services the CLI drives.
 *
 * @packageDocumentation
 */

export { createContext } from './context';
export type { RunContext, CreateContextOptions } from './context';
export { ConfigError, LaunchError, errorCode, errorMessage } from './errors';
export type { ConfigErrorCode, LaunchErrorCode } from './errors';
export * from './config';
export * from './logging';
export * from './policy';
export * from './services';
export { splitCommandLine, normalizeCommand } from './command';
export type { Argv } from './command';
export { detachedLauncher } from './launcher';
export type { ProcessLauncher, LaunchOptions, LaunchedProcess } from './launcher';
