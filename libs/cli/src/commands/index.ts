/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createLaunchCommand } from './launch';
export { createTaskCommand } from './task';
export { createTaskAllCommand } from './task-all';
export { createStatusCommand } from './status';
export { createCheckCommand } from './check';
export { createForgetCommand } from './forget';
export type { CommandRunner } from './types';
