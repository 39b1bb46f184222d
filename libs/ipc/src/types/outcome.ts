/**
 * Structured outcomes handed back to the CLI layer
 */

import type { CleanupTarget, DestroyReport } from './wipe';

export interface IdlePolicy {
  /** Whole days; absent means never clean up */
  thresholdDays?: number;
  targets: CleanupTarget[];
}

/**
 * Terminal state reached for one application in one run.
 */
export type IdleState =
  | 'no-threshold'
  | 'never-launched'
  | 'not-idle'
  | 'no-targets'
  | 'app-missing'
  | 'cleanup-done'
  | 'cleanup-partial';

export interface CleanupOutcome {
  appId: string;
  state: IdleState;
  thresholdDays?: number;
  idleDays?: number;
  /** ISO-8601 UTC */
  lastLaunchAt?: string;
  /** One report per target, in configured order */
  targets: DestroyReport[];
  /** Set when the store could not be read and usage was treated as unknown */
  storeError?: string;
}

export type BatchEntry =
  | { appId: string; outcome: CleanupOutcome }
  | { appId: string; error: string; code?: string };

export interface BatchOutcome {
  results: BatchEntry[];
}

export interface LaunchOutcome {
  appId: string;
  argv: string[];
  pid?: number;
  /** ISO-8601 UTC; absent when recording failed */
  recordedAt?: string;
  storeError?: string;
}

export interface UsageReportEntry {
  appId: string;
  lastLaunchAt?: string;
  idleDays?: number;
  thresholdDays?: number;
  /** Human readable distance, e.g. "5 days ago" */
  lastLaunchRelative?: string;
  /** Whether a task run now would clean up (ignoring target existence) */
  overThreshold: boolean;
  error?: string;
}
