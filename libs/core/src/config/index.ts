export { getStateDir, getConfigPath, getDbPath, getLogPath } from './paths';
export { loadConfigFile, resolveApp, validateConfig, listAppIds } from './loader';
export type { ConfigIssue } from './loader';
