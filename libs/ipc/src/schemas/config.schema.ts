/**
 * Zod schemas for the idlewipe configuration file
 *
 * The file uses snake_case keys (it is written by hand); parsed values are
 * transformed into camelCase domain objects.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../constants';

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const PassesSchema = z.number().int().min(1).max(35);

/**
 * Command to launch: a non-empty command line or a non-empty argv list.
 */
export const CommandSpecSchema = z.union([
  z.string().trim().min(1, "'cmd' string cannot be empty"),
  z.array(z.string().min(1)).min(1, "'cmd' list cannot be empty"),
]);

/**
 * A single application entry
 */
export const AppEntrySchema = z.object({
  cmd: CommandSpecSchema,
  max_days_idle: z.number().int().positive().optional(),
  cleanup_paths: z.array(z.string().min(1)).default([]),
  passes: PassesSchema.optional(),
});

export const AppDefinitionSchema = AppEntrySchema.transform((entry) => ({
  command: entry.cmd,
  thresholdDays: entry.max_days_idle,
  cleanupPaths: entry.cleanup_paths,
  passes: entry.passes,
}));

export const AppIdSchema = z.string().min(1);

/**
 * `apps` as a list of entries carrying their own `id`. Ids must be unique.
 */
export const AppListSchema = z
  .array(z.looseObject({ id: AppIdSchema }))
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: 'custom',
          message: `Duplicate app id '${entry.id}'`,
          path: [index, 'id'],
        });
      }
      seen.add(entry.id);
    });
  });

/**
 * Top-level file. App entries stay unvalidated here so one broken entry does
 * not take down every other application.
 */
export const ConfigFileSchema = z.object({
  log_level: LogLevelSchema.optional(),
  passes: PassesSchema.optional(),
  apps: z.union([z.record(AppIdSchema, z.unknown()), AppListSchema]),
});
