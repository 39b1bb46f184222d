import * as fs from 'node:fs';
import * as path from 'node:path';
import { runTask, runTaskAll } from '../tasks';
import { daysBefore, NOW, configWith, makeExecutable, makeTmpDir, removeDir, testContext } from '../../__tests__/helpers';
import type { TestContext } from '../../__tests__/helpers';

describe('task services', () => {
  let dir: string;
  let ctx: TestContext;
  let executable: string;

  beforeEach(() => {
    dir = makeTmpDir('tasks-test-');
    ctx = testContext(dir);
    executable = makeExecutable(dir, 'app');
  });

  afterEach(() => {
    removeDir(dir);
  });

  function makeProfile(name: string): string {
    const profile = path.join(dir, name);
    fs.mkdirSync(profile);
    fs.writeFileSync(path.join(profile, 'history'), 'visited pages');
    return profile;
  }

  function launchedDaysAgo(appId: string, days: number): void {
    ctx.clock.set(daysBefore(days));
    ctx.tracker.recordLaunch(appId);
    ctx.clock.set(NOW);
  }

  describe('runTask', () => {
    it('cleans up an app idle past its threshold', () => {
      const profile = makeProfile('browser-profile');
      launchedDaysAgo('browser', 4);
      const config = configWith({
        browser: { cmd: [executable], max_days_idle: 3, cleanup_paths: ['~/browser-profile'], passes: 1 },
      });

      const outcome = runTask(ctx, config, 'browser');

      expect(outcome.state).toBe('cleanup-done');
      expect(outcome.targets).toEqual([
        expect.objectContaining({ path: profile, kind: 'directory', removed: true, filesOverwritten: 1 }),
      ]);
      expect(fs.existsSync(profile)).toBe(false);
    });

    it('skips an app whose executable is gone', () => {
      const profile = makeProfile('browser-profile');
      launchedDaysAgo('browser', 30);
      const config = configWith({
        browser: { cmd: [path.join(dir, 'uninstalled')], max_days_idle: 3, cleanup_paths: [profile] },
      });

      expect(runTask(ctx, config, 'browser')).toEqual({ appId: 'browser', state: 'app-missing', targets: [] });
      expect(fs.existsSync(profile)).toBe(true);
    });

    it('throws for an invalid entry', () => {
      const config = configWith({ browser: { cmd: [executable], max_days_idle: 'three' } });

      let thrown: unknown;
      try {
        runTask(ctx, config, 'browser');
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toMatchObject({ name: 'ConfigError', code: 'APP_INVALID', appId: 'browser' });
    });
  });

  describe('runTaskAll', () => {
    it('processes every app and isolates failures', () => {
      const first = makeProfile('first-profile');
      const third = makeProfile('third-profile');
      launchedDaysAgo('first', 10);
      launchedDaysAgo('third', 10);
      const config = configWith({
        first: { cmd: [executable], max_days_idle: 3, cleanup_paths: [first] },
        second: { cmd: [executable], max_days_idle: 'three' },
        third: { cmd: [executable], max_days_idle: 3, cleanup_paths: [third] },
      });

      const { results } = runTaskAll(ctx, config);

      expect(results.map((r) => r.appId)).toEqual(['first', 'second', 'third']);
      expect(results[0]).toMatchObject({ outcome: { state: 'cleanup-done' } });
      expect(results[1]).toMatchObject({ code: 'APP_INVALID' });
      expect(results[1] && 'error' in results[1] ? results[1].error : '').toContain("app 'second'");
      expect(results[2]).toMatchObject({ outcome: { state: 'cleanup-done' } });
      expect(fs.existsSync(first)).toBe(false);
      expect(fs.existsSync(third)).toBe(false);
    });

    it('returns no results when no apps are configured', () => {
      expect(runTaskAll(ctx, configWith({}))).toEqual({ results: [] });
    });

    it('reports each state in configuration order', () => {
      launchedDaysAgo('recent', 1);
      const config = configWith({
        unlimited: { cmd: [executable] },
        fresh: { cmd: [executable], max_days_idle: 5 },
        recent: { cmd: [executable], max_days_idle: 5 },
        gone: { cmd: ['/nonexistent/bin/app'], max_days_idle: 5 },
      });

      const states = runTaskAll(ctx, config).results.map((r) => ('outcome' in r ? r.outcome.state : r.error));

      expect(states).toEqual(['no-threshold', 'never-launched', 'not-idle', 'app-missing']);
    });
  });
});
