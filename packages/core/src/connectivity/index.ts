export { ConnectivityChecker } from './checker.js';
export type { ConnectivityReport, SSHCheckResult, HTTPSCheckResult } from './checker.js';
