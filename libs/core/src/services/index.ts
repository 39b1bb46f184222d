export { launchApp, resolveCommand } from './launch';
export { runTask, runTaskAll } from './tasks';
export { getUsageReport } from './usage-report';
