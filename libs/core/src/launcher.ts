/**
 * Detached process launcher
 */

import { spawn } from 'node:child_process';
import type { Env } from '@idlewipe/shred';

export interface LaunchOptions {
  env: Env;
  cwd: string;
}

export interface LaunchedProcess {
  pid?: number;
}

/**
 * Starts an application without waiting for it. Resolves once the process
 * has been created; rejects if it could not be.
 */
export interface ProcessLauncher {
  launch(executable: string, args: readonly string[], options: LaunchOptions): Promise<LaunchedProcess>;
}

export const detachedLauncher: ProcessLauncher = {
  launch(executable, args, options) {
    return new Promise((resolve, reject) => {
      // New session/process group so the app outlives this invocation
      const child = spawn(executable, [...args], {
        cwd: options.cwd,
        env: options.env,
        detached: true,
        stdio: 'ignore',
      });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        resolve({ pid: child.pid });
      });
    });
  },
};
