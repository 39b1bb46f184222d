/**
 * Process exit codes
 */

import type { BatchOutcome, CleanupOutcome } from '@idlewipe/ipc';

export const EXIT_CODES = {
  OK: 0,
  /** Configuration, launch or store error */
  ERROR: 1,
  /** Cleanup left something behind, or a batch had failures */
  PARTIAL: 2,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForOutcome(outcome: CleanupOutcome): ExitCode {
  return outcome.state === 'cleanup-partial' ? EXIT_CODES.PARTIAL : EXIT_CODES.OK;
}

export function exitCodeForBatch(batch: BatchOutcome): ExitCode {
  const failed = batch.results.some((entry) => 'error' in entry || exitCodeForOutcome(entry.outcome) !== EXIT_CODES.OK);
  return failed ? EXIT_CODES.PARTIAL : EXIT_CODES.OK;
}
