/**
 * check command - Report whether the model is in sync with the tracker
 * snapshots, without writing a change set
 */

import type { CommandContext, CommandResult, ModuleReport } from '../types.js';
import { header, printModuleReports, warn } from '../utils/output.js';
import { runChangeSet, type ChangeSetInputOptions } from './changeset.js';

export type CheckOptions = ChangeSetInputOptions;

export interface CheckResult {
  modules: ModuleReport[];
  inSync: boolean;
}

/**
 * Execute the check command
 *
 * Succeeds only when every module is up to date.
 */
export async function checkCommand(
  ctx: CommandContext,
  options: CheckOptions
): Promise<CommandResult<CheckResult>> {
  const { outputFormat } = ctx;

  const run = await runChangeSet(ctx, options);
  if (run === undefined) {
    return {
      success: false,
      message: 'No model specified. Use --model <path> or set model.path in the configuration',
    };
  }
  const { reports } = run;

  if (outputFormat === 'human') {
    header('Sync Check');
    printModuleReports(reports, outputFormat);
  }

  const outdated = reports.filter((report) => report.status !== 'up-to-date');
  const inSync = outdated.length === 0;
  if (!inSync && outputFormat === 'human') {
    warn("Run 'req-sync diff' to see the pending change actions");
  }
  return {
    success: inSync,
    message: inSync
      ? `All ${reports.length} module(s) up to date`
      : `${outdated.length} of ${reports.length} module(s) out of sync`,
    data: { modules: reports, inSync },
    errors: outdated
      .filter((report) => report.error !== undefined)
      .map((report) => `${report.uuid ?? '(no uuid)'}: ${report.error}`),
  };
}
