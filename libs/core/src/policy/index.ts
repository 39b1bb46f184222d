export { countIdleDays, resolveIdlePolicy, evaluateAndClean } from './idle-policy';
