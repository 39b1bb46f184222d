/**
 * Configuration types
 */

import type { z } from 'zod';
import type {
  AppDefinitionSchema,
  CommandSpecSchema,
  ConfigFileSchema,
  LogLevelSchema,
} from '../schemas/config.schema';

export type LogLevel = z.infer<typeof LogLevelSchema>;

export type CommandSpec = z.infer<typeof CommandSpecSchema>;

/** Parsed configuration file before per-app validation */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** A validated application entry */
export type AppDefinition = z.infer<typeof AppDefinitionSchema>;

/**
 * Loaded configuration. `apps` keeps raw entries keyed by application id;
 * each one is validated when it is resolved.
 */
export interface LauncherConfig {
  /** Where the configuration was read from */
  source: string;
  logLevel?: LogLevel;
  passes?: number;
  apps: Record<string, unknown>;
}
