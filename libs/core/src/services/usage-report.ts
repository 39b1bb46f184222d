/**
 * Usage report for the status command
 */

import { formatDistanceStrict } from 'date-fns';
import type { LauncherConfig, UsageReportEntry } from '@idlewipe/ipc';
import type { RunContext } from '../context';
import { listAppIds, resolveApp } from '../config/loader';
import { errorMessage } from '../errors';
import { countIdleDays } from '../policy/idle-policy';

/**
 * One entry per configured application, in file order. Reads the store once.
 * Throws the store's error when it cannot be read at all.
 */
export function getUsageReport(ctx: RunContext, config: LauncherConfig): UsageReportEntry[] {
  const listed = ctx.tracker.listLaunches();
  if (!listed.ok) throw listed.error;

  const launches = new Map(listed.value.map((record) => [record.appId, record.lastLaunchAt]));
  const now = ctx.clock.now();

  return listAppIds(config).map((appId): UsageReportEntry => {
    let thresholdDays: number | undefined;
    let error: string | undefined;
    try {
      thresholdDays = resolveApp(config, appId).thresholdDays;
    } catch (cause) {
      error = errorMessage(cause);
    }

    const last = launches.get(appId);
    if (!last) {
      return { appId, thresholdDays, overThreshold: false, ...(error ? { error } : {}) };
    }

    const idleDays = countIdleDays(last, now);
    return {
      appId,
      lastLaunchAt: last.toISOString(),
      lastLaunchRelative: formatDistanceStrict(last, now, { addSuffix: true }),
      idleDays,
      thresholdDays,
      overThreshold: thresholdDays !== undefined && idleDays > thresholdDays,
      ...(error ? { error } : {}),
    };
  });
}
