/**
 * Task services: evaluate idle applications and clean them up
 */

import type { BatchEntry, BatchOutcome, CleanupOutcome, LauncherConfig } from '@idlewipe/ipc';
import type { RunContext } from '../context';
import { listAppIds, resolveApp } from '../config/loader';
import { errorCode, errorMessage } from '../errors';
import { evaluateAndClean, resolveIdlePolicy } from '../policy/idle-policy';
import { resolveCommand } from './launch';

/**
 * Run the idle check for one application.
 *
 * An application whose executable no longer resolves is assumed to be
 * uninstalled and is skipped without touching its data.
 */
export function runTask(ctx: RunContext, config: LauncherConfig, appId: string): CleanupOutcome {
  const app = resolveApp(config, appId);

  const [program] = resolveCommand(ctx, appId, app.command);
  if (!ctx.platform.findExecutable(program, ctx.env)) {
    ctx.logger.warn(
      { appId, executable: program },
      'Executable not found; app may have been uninstalled. Skipping (remove it from the configuration or reinstall it)',
    );
    return { appId, state: 'app-missing', targets: [] };
  }

  return evaluateAndClean(ctx, appId, resolveIdlePolicy(app, ctx));
}

/**
 * Run the idle check for every configured application, in file order. One
 * application's failure is logged and recorded, and the rest still run.
 */
export function runTaskAll(ctx: RunContext, config: LauncherConfig): BatchOutcome {
  const appIds = listAppIds(config);
  if (appIds.length === 0) {
    ctx.logger.info({ source: config.source }, 'No apps configured');
    return { results: [] };
  }

  ctx.logger.info({ apps: appIds.length }, 'Running task for all apps');
  const results: BatchEntry[] = [];

  for (const appId of appIds) {
    try {
      results.push({ appId, outcome: runTask(ctx, config, appId) });
    } catch (error) {
      const code = errorCode(error);
      ctx.logger.error({ appId, code, err: error }, 'Task failed for app');
      results.push({ appId, error: errorMessage(error), ...(code ? { code } : {}) });
    }
  }

  ctx.logger.info({ apps: appIds.length, failed: results.filter((r) => 'error' in r).length }, 'Finished all apps');
  return { results };
}
