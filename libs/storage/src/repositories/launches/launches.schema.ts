/**
 * Launch schemas: Zod validation schemas and the row codec
 */

import { z } from 'zod';
import type { DbLaunchRow } from '../../types';
import { parseInstant } from '../../instant';

export const LaunchRowSchema = z.object({
  app_id: z.string(),
  last_launch_at: z.string(),
}) satisfies z.ZodType<DbLaunchRow>;

export const LaunchRecordSchema = z.object({
  appId: z.string().min(1),
  lastLaunchAt: z.date(),
});
export type LaunchRecordInput = z.input<typeof LaunchRecordSchema>;

// ---- Codec: DB row (snake_case) ↔ domain (camelCase) ----

export const LaunchCodec = z.codec(LaunchRowSchema, LaunchRecordSchema, {
  decode: (row) => ({
    appId: row.app_id,
    lastLaunchAt: parseInstant(row.last_launch_at),
  }),
  encode: (record) => ({
    app_id: record.appId,
    last_launch_at: record.lastLaunchAt.toISOString(),
  }),
});
