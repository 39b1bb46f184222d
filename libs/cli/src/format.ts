/**
 * Human-readable command output
 */

import type { CleanupOutcome, DestroyReport, UsageReportEntry } from '@idlewipe/ipc';
import type { ConfigIssue } from '@idlewipe/core';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function failureLines(reports: DestroyReport[]): string[] {
  return reports.flatMap((report) =>
    report.failures.map((f) => `  ! ${f.operation} ${f.path}: ${f.code ?? f.message}`),
  );
}

export function formatOutcome(outcome: CleanupOutcome): string {
  const { appId, idleDays, thresholdDays } = outcome;
  const idle = `idle ${plural(idleDays ?? 0, 'day')}`;

  switch (outcome.state) {
    case 'no-threshold':
      return `${appId}: no idle threshold configured`;
    case 'never-launched':
      return outcome.storeError
        ? `${appId}: usage unknown (${outcome.storeError}); nothing deleted`
        : `${appId}: never launched; nothing deleted`;
    case 'app-missing':
      return `${appId}: executable not found, app may have been uninstalled; skipped`;
    case 'not-idle':
      return `${appId}: ${idle} (limit ${thresholdDays}); kept`;
    case 'no-targets':
      return `${appId}: ${idle} (limit ${thresholdDays}); no cleanup paths configured`;
    case 'cleanup-done':
      return `${appId}: ${idle} (limit ${thresholdDays}); destroyed ${plural(outcome.targets.length, 'target')}`;
    case 'cleanup-partial': {
      const failures = outcome.targets.reduce((n, r) => n + r.failures.length, 0);
      return [
        `${appId}: ${idle} (limit ${thresholdDays}); cleanup incomplete, ${plural(failures, 'failure')}`,
        ...failureLines(outcome.targets),
      ].join('\n');
    }
  }
}

export function formatUsageReport(entries: UsageReportEntry[]): string {
  if (entries.length === 0) return 'No apps configured.';

  const rows = entries.map((e) => [
    e.appId,
    e.lastLaunchRelative ?? 'never',
    e.idleDays === undefined ? '-' : String(e.idleDays),
    e.thresholdDays === undefined ? '-' : String(e.thresholdDays),
    e.error ? 'invalid config' : e.overThreshold ? 'over limit' : 'ok',
  ]);
  const header = ['APP', 'LAST LAUNCH', 'IDLE', 'LIMIT', 'STATUS'];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const render = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

  return [render(header), ...rows.map(render)].join('\n');
}

export function formatIssues(issues: ConfigIssue[]): string {
  return issues.map((issue) => `${issue.appId}: ${issue.message}`).join('\n');
}
