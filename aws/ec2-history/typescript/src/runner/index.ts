/**
 * Run orchestration.
 */

export type { HistoryRunnerOptions, RunRequest } from './runner.js';
export { HistoryRunner } from './runner.js';
