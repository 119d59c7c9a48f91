/**
 * Command exports
 */

export { diffCommand, type DiffOptions, type DiffResult } from './diff.js';
export { checkCommand, type CheckOptions, type CheckResult } from './check.js';
