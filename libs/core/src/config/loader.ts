/**
 * Configuration loader
 *
 * Reads the JSON configuration file once per invocation. The file as a whole
 * is validated up front; each application entry is validated when it is
 * resolved so a broken entry only affects that application.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { AppDefinitionSchema, ConfigFileSchema } from '@idlewipe/ipc';
import type { AppDefinition, LauncherConfig } from '@idlewipe/ipc';
import { errnoCode } from '@idlewipe/shred';
import { ConfigError, errorMessage } from '../errors';

export interface ConfigIssue {
  appId: string;
  message: string;
}

function readConfigText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${filePath}`, 'CONFIG_NOT_FOUND', { cause: error });
    }
    throw new ConfigError(`Cannot read configuration file ${filePath}: ${errorMessage(error)}`, 'CONFIG_UNREADABLE', { cause: error });
  }
}

/**
 * Load and validate the configuration file. Throws ConfigError.
 */
export function loadConfigFile(filePath: string): LauncherConfig {
  const text = readConfigText(filePath);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`, 'CONFIG_INVALID', { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration in ${filePath}:\n${z.prettifyError(parsed.error)}`,
      'CONFIG_INVALID',
      { issues: parsed.error.issues },
    );
  }

  const { apps } = parsed.data;
  return {
    source: filePath,
    logLevel: parsed.data.log_level,
    passes: parsed.data.passes,
    apps: Array.isArray(apps) ? Object.fromEntries(apps.map((entry) => [entry.id, entry])) : apps,
  };
}

/** Configured application ids, in file order. */
export function listAppIds(config: LauncherConfig): string[] {
  return Object.keys(config.apps);
}

/**
 * Validate one application entry. Throws ConfigError for an unknown id or an
 * invalid entry.
 */
export function resolveApp(config: LauncherConfig, appId: string): AppDefinition {
  if (!Object.hasOwn(config.apps, appId)) {
    throw new ConfigError(`Unknown app '${appId}' (not in ${config.source})`, 'APP_UNKNOWN', { appId });
  }

  const parsed = AppDefinitionSchema.safeParse(config.apps[appId]);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration for app '${appId}':\n${z.prettifyError(parsed.error)}`,
      'APP_INVALID',
      { appId, issues: parsed.error.issues },
    );
  }
  return parsed.data;
}

/**
 * Collect the problems of every application entry without throwing.
 */
export function validateConfig(config: LauncherConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  for (const appId of listAppIds(config)) {
    const parsed = AppDefinitionSchema.safeParse(config.apps[appId]);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const where = issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ` : '';
        issues.push({ appId, message: `${where}${issue.message}` });
      }
    }
  }
  return issues;
}
