import type { Command } from 'commander';
import type { Runtime } from '../runtime';
import type { ExitCode } from '../utils/exit-codes';

/**
 * Builds the runtime from a command's global options, runs the body and
 * turns its result or error into an exit code.
 */
export type CommandRunner = (command: Command, body: (runtime: Runtime) => ExitCode | Promise<ExitCode>) => Promise<void>;
