/**
 * idlewipe command-line interface
 *
 * @packageDocumentation
 */

export { createProgram } from './program';
export type { ProgramOptions } from './program';
export { createRuntime, resolveLogLevel } from './runtime';
export type { Runtime, RuntimeOverrides, GlobalOptions } from './runtime';
export { EXIT_CODES, exitCodeForOutcome, exitCodeForBatch } from './utils/exit-codes';
export type { ExitCode } from './utils/exit-codes';
