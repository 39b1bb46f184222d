/**
 * Status command
 *
 * Shows when each configured application was last launched.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { getUsageReport } from '@idlewipe/core';
import type { Runtime } from '../runtime';
import { formatUsageReport } from '../format';
import { EXIT_CODES } from '../utils/exit-codes';
import type { ExitCode } from '../utils/exit-codes';
import type { CommandRunner } from './types';

const StatusOptionsSchema = z.object({ json: z.boolean().optional() });

export function runStatus(runtime: Runtime, options: { json?: boolean }): ExitCode {
  const report = getUsageReport(runtime.ctx, runtime.config);
  runtime.out(options.json ? JSON.stringify(report, null, 2) : formatUsageReport(report));
  return EXIT_CODES.OK;
}

/**
 * Create the status command
 */
export function createStatusCommand(run: CommandRunner): Command {
  return new Command('status')
    .description('Show last launch and idle time for each application')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: unknown, command: Command) => {
      const parsed = StatusOptionsSchema.parse(options);
      await run(command, (runtime) => runStatus(runtime, parsed));
    });
}
