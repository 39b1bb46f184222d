import type { CleanupOutcome, DestroyReport } from '@idlewipe/ipc';
import { formatIssues, formatOutcome, formatUsageReport } from '../format';

function report(overrides: Partial<DestroyReport> = {}): DestroyReport {
  return {
    path: '/home/tester/.cache/app',
    kind: 'directory',
    removed: true,
    entriesRemoved: 3,
    filesOverwritten: 2,
    bytesOverwritten: 2048,
    failures: [],
    ...overrides,
  };
}

describe('formatOutcome', () => {
  const base = { appId: 'mail', thresholdDays: 7, idleDays: 9, targets: [] };

  it.each<[CleanupOutcome, string]>([
    [{ appId: 'mail', state: 'no-threshold', targets: [] }, 'mail: no idle threshold configured'],
    [{ appId: 'mail', state: 'never-launched', thresholdDays: 7, targets: [] }, 'mail: never launched; nothing deleted'],
    [
      { appId: 'mail', state: 'never-launched', thresholdDays: 7, targets: [], storeError: 'store is locked' },
      'mail: usage unknown (store is locked); nothing deleted',
    ],
    [{ appId: 'mail', state: 'app-missing', targets: [] }, 'mail: executable not found, app may have been uninstalled; skipped'],
    [{ ...base, idleDays: 1, state: 'not-idle' }, 'mail: idle 1 day (limit 7); kept'],
    [{ ...base, state: 'no-targets' }, 'mail: idle 9 days (limit 7); no cleanup paths configured'],
    [{ ...base, state: 'cleanup-done', targets: [report(), report()] }, 'mail: idle 9 days (limit 7); destroyed 2 targets'],
  ])('formats %o', (outcome, expected) => {
    expect(formatOutcome(outcome)).toBe(expected);
  });

  it('lists each failure of a partial cleanup', () => {
    const failed = report({
      removed: false,
      failures: [{ path: '/home/tester/.cache/app/lock', operation: 'unlink', code: 'EBUSY', message: 'resource busy' }],
    });

    expect(formatOutcome({ ...base, state: 'cleanup-partial', targets: [failed] })).toBe(
      'mail: idle 9 days (limit 7); cleanup incomplete, 1 failure\n  ! unlink /home/tester/.cache/app/lock: EBUSY',
    );
  });
});

describe('formatUsageReport', () => {
  it('renders an aligned table', () => {
    const text = formatUsageReport([
      { appId: 'browser', lastLaunchRelative: '5 days ago', idleDays: 5, thresholdDays: 3, overThreshold: true },
      { appId: 'mail', thresholdDays: 30, overThreshold: false },
      { appId: 'x', overThreshold: false, error: 'bad' },
    ]);

    expect(text.split('\n')).toEqual([
      'APP      LAST LAUNCH  IDLE  LIMIT  STATUS',
      'browser  5 days ago   5     3      over limit',
      'mail     never        -     30     ok',
      'x        never        -     -      invalid config',
    ]);
  });

  it('says when nothing is configured', () => {
    expect(formatUsageReport([])).toBe('No apps configured.');
  });
});

describe('formatIssues', () => {
  it('prefixes each issue with its app', () => {
    expect(formatIssues([{ appId: 'a', message: 'cmd: Invalid input' }, { appId: 'b', message: 'passes: Too big' }])).toBe(
      'a: cmd: Invalid input\nb: passes: Too big',
    );
  });
});
