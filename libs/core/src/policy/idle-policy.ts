/**
 * Idle decision policy
 *
 * Decides whether an application has been idle longer than its threshold
 * and, if so, destroys its cleanup targets.
 */

import { differenceInHours } from 'date-fns';
import type { AppDefinition, CleanupOutcome, IdlePolicy } from '@idlewipe/ipc';
import { normalizePathList } from '@idlewipe/shred';
import { MigrationError } from '@idlewipe/storage';
import type { RunContext } from '../context';
import { ConfigError } from '../errors';

/**
 * Whole days between two instants, truncated toward zero.
 */
export function countIdleDays(lastLaunch: Date, now: Date): number {
  return Math.trunc(differenceInHours(now, lastLaunch) / 24);
}

/**
 * Build the policy for an application: threshold plus normalized targets,
 * each with its pass count (app, then file, then default).
 */
export function resolveIdlePolicy(app: AppDefinition, ctx: Pick<RunContext, 'platform' | 'env' | 'cwd' | 'passes'>): IdlePolicy {
  const passes = app.passes ?? ctx.passes;
  return {
    thresholdDays: app.thresholdDays,
    targets: normalizePathList(app.cleanupPaths, ctx).map((path) => ({ path, passes })),
  };
}

/**
 * Evaluate one application and clean up when it is idle past its threshold.
 *
 * An application with no recorded launch is never cleaned up. Store read
 * failures count as "no record"; a failed migration is rethrown.
 */
export function evaluateAndClean(ctx: RunContext, appId: string, policy: IdlePolicy): CleanupOutcome {
  const { logger } = ctx;
  const { thresholdDays, targets } = policy;

  if (thresholdDays === undefined) {
    logger.info({ appId }, 'No idle threshold configured; nothing to do');
    return { appId, state: 'no-threshold', targets: [] };
  }
  if (!Number.isInteger(thresholdDays) || thresholdDays < 1) {
    throw new ConfigError(`Idle threshold for app '${appId}' must be a positive integer, got ${thresholdDays}`, 'APP_INVALID', { appId });
  }

  const read = ctx.tracker.readLastLaunch(appId);
  if (!read.ok && read.error instanceof MigrationError) {
    throw read.error;
  }

  const lastLaunch = read.ok ? read.value : null;
  if (lastLaunch === null) {
    logger.info({ appId }, 'App has never been launched; skipping');
    return {
      appId,
      state: 'never-launched',
      thresholdDays,
      targets: [],
      ...(read.ok ? {} : { storeError: read.error.message }),
    };
  }

  const idleDays = countIdleDays(lastLaunch, ctx.clock.now());
  const observed = { appId, thresholdDays, idleDays, lastLaunchAt: lastLaunch.toISOString() };

  if (idleDays <= thresholdDays) {
    logger.info(observed, 'App is within its idle threshold');
    return { ...observed, state: 'not-idle', targets: [] };
  }

  if (targets.length === 0) {
    logger.info(observed, 'Idle threshold exceeded but no cleanup paths configured');
    return { ...observed, state: 'no-targets', targets: [] };
  }

  logger.info({ ...observed, targets: targets.length }, 'Idle threshold exceeded; destroying cleanup targets');
  const reports = targets.map((target) => ctx.deleter.destroy(target.path, target.passes));
  const partial = reports.some((report) => !report.removed || report.failures.length > 0);

  if (partial) {
    logger.warn({ appId, failures: reports.reduce((n, r) => n + r.failures.length, 0) }, 'Cleanup finished with failures');
  }
  return { ...observed, state: partial ? 'cleanup-partial' : 'cleanup-done', targets: reports };
}
