import * as path from 'node:path';
import pino from 'pino';
import { posixPlatform } from '@idlewipe/shred';
import { createContext } from '../context';
import { detachedLauncher } from '../launcher';
import { configWith } from './helpers';

describe('createContext', () => {
  const logger = pino({ level: 'silent' });

  it('uses the configured pass count and the state directory store', () => {
    const ctx = createContext({
      logger,
      config: configWith({}, { passes: 5 }),
      platform: posixPlatform,
      env: { HOME: '/home/tester' },
      cwd: '/work',
    });

    expect(ctx.passes).toBe(5);
    expect(ctx.cwd).toBe('/work');
    expect(ctx.tracker.dbPath).toBe(path.posix.join('/home/tester', '.app_launch_tracker', 'state.db'));
    expect(ctx.launcher).toBe(detachedLauncher);
  });

  it('defaults to three passes', () => {
    const ctx = createContext({ logger, platform: posixPlatform, env: { IDLEWIPE_HOME: '/srv/idlewipe' } });

    expect(ctx.passes).toBe(3);
    expect(ctx.tracker.dbPath).toBe('/srv/idlewipe/state.db');
  });
});
