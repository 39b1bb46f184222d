#!/usr/bin/env node
/**
 * idlewipe CLI
 *
 * @example
 * ```bash
 * # Launch an application through the tracker
 * idlewipe launch firefox
 *
 * # Scheduled cleanup of every configured application
 * idlewipe task-all
 * ```
 */

import { createProgram } from './program';
import { EXIT_CODES } from './utils/exit-codes';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  process.once('SIGINT', () => {
    process.stderr.write('Interrupted\n');
    process.exit(EXIT_CODES.INTERRUPTED);
  });

  await createProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(EXIT_CODES.ERROR);
});
