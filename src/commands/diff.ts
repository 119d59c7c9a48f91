/**
 * diff command - Calculate the change actions that bring the model in line
 * with the tracker snapshots
 */

import { writeFile } from 'node:fs/promises';
import type { CommandContext, CommandResult, ModuleReport } from '../types.js';
import type { ChangeAction } from '../changeset/types.js';
import { dumpChangeSet } from '../changeset/yaml.js';
import { header, info, printModuleReports, success } from '../utils/output.js';
import { runChangeSet, type ChangeSetInputOptions } from './changeset.js';

export interface DiffOptions extends ChangeSetInputOptions {
  /** Write the change set to this file instead of stdout */
  output?: string;
}

export interface DiffResult {
  modules: ModuleReport[];
  actions: ChangeAction[];
}

/**
 * Execute the diff command
 */
export async function diffCommand(
  ctx: CommandContext,
  options: DiffOptions
): Promise<CommandResult<DiffResult>> {
  const { outputFormat } = ctx;

  const run = await runChangeSet(ctx, options);
  if (run === undefined) {
    return {
      success: false,
      message: 'No model specified. Use --model <path> or set model.path in the configuration',
    };
  }
  const { result, reports } = run;

  if (outputFormat === 'human') {
    header('Change Set');
    printModuleReports(reports, outputFormat);
  }

  const yaml = dumpChangeSet(result.actions);
  if (options.output) {
    await writeFile(options.output, yaml, 'utf-8');
    if (outputFormat === 'human') {
      success(`Wrote ${result.actions.length} action(s) to ${options.output}`);
    }
  } else if (outputFormat === 'human') {
    if (result.actions.length > 0) {
      console.log();
      process.stdout.write(yaml);
    } else {
      info('No changes detected');
    }
  }

  const errors = result.errors.map((failure) => failure.error.toUserMessage());
  return {
    success: errors.length === 0,
    message:
      errors.length === 0
        ? `Calculated ${result.actions.length} action(s) for ${result.modules.length} module(s)`
        : `${errors.length} module(s) failed`,
    data: { modules: reports, actions: result.actions },
    errors: errors.length > 0 ? errors : undefined,
  };
}
