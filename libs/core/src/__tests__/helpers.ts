import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import pino from 'pino';
import { fixedClock } from '@idlewipe/ipc';
import type { Clock, LauncherConfig } from '@idlewipe/ipc';
import { posixPlatform } from '@idlewipe/shred';
import { createContext } from '../context';
import type { RunContext } from '../context';
import type { LaunchedProcess, LaunchOptions, ProcessLauncher } from '../launcher';

export const NOW = new Date('2024-06-15T12:00:00.000Z');

export function daysBefore(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * 24 * 60 * 60 * 1000);
}

export function makeTmpDir(prefix: string): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeDir(dir: string): void {
  try { fs.rmSync(dir, { recursive: true, force: true }); } catch { /* */ }
}

/** Create an executable stub the platform lookup will accept. */
export function makeExecutable(dir: string, name: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, '#!/bin/sh\nexit 0\n');
  fs.chmodSync(file, 0o755);
  return file;
}

export class FakeLauncher implements ProcessLauncher {
  readonly calls: Array<{ executable: string; args: readonly string[]; options: LaunchOptions }> = [];
  failure: Error | null = null;

  async launch(executable: string, args: readonly string[], options: LaunchOptions): Promise<LaunchedProcess> {
    this.calls.push({ executable, args, options });
    if (this.failure) throw this.failure;
    return { pid: 4242 };
  }
}

export interface TestContext extends RunContext {
  clock: Clock & { set(next: Date): void };
  launcher: FakeLauncher;
}

export function testContext(dir: string, config?: LauncherConfig): TestContext {
  const clock = fixedClock(NOW);
  const launcher = new FakeLauncher();
  const ctx = createContext({
    logger: pino({ level: 'silent' }),
    config,
    clock,
    platform: posixPlatform,
    env: { HOME: dir, PATH: '' },
    cwd: dir,
    dbPath: path.join(dir, 'state', 'state.db'),
    launcher,
  });
  return { ...ctx, clock, launcher };
}

export function configWith(apps: Record<string, unknown>, extra: Partial<LauncherConfig> = {}): LauncherConfig {
  return { source: '/test/config.json', apps, ...extra };
}
