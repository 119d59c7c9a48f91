/**
 * Shared input loading for commands that calculate a change set
 */

import type { CommandContext, ModuleReport } from '../types.js';
import { loadConfig } from '../config/index.js';
import { loadModelDump } from '../model/dump.js';
import { MemoryModel } from '../model/memory.js';
import { loadSnapshots } from '../snapshot/ingest.js';
import { calculateChangeSet, type ChangeSetResult } from '../changeset/index.js';
import { summarizeChangeSet } from '../changeset/summary.js';
import { verbose } from '../utils/output.js';
import { createLogger } from '../utils/logger.js';

export interface ChangeSetInputOptions {
  /** Tracker snapshot file */
  snapshot: string;
  /** Model dump file, overriding `model.path` of the configuration */
  model?: string;
}

export interface ChangeSetRun {
  result: ChangeSetResult;
  reports: ModuleReport[];
}

/**
 * Load configuration, model and snapshots, then calculate the change set
 *
 * @returns undefined when no model location is configured
 * @throws LoadError if an input file cannot be loaded
 */
export async function runChangeSet(
  ctx: CommandContext,
  options: ChangeSetInputOptions
): Promise<ChangeSetRun | undefined> {
  const { options: globalOpts } = ctx;

  verbose(`Config: ${globalOpts.config}`, globalOpts.verbose);
  const config = await loadConfig(globalOpts.config);

  const modelPath = options.model ?? config.model?.path;
  if (modelPath === undefined) {
    return undefined;
  }
  verbose(`Model: ${modelPath}`, globalOpts.verbose);
  verbose(`Snapshot: ${options.snapshot}`, globalOpts.verbose);

  const [dump, snapshots] = await Promise.all([
    loadModelDump(modelPath),
    loadSnapshots(options.snapshot),
  ]);
  const graph = MemoryModel.fromDump(dump);

  const log = createLogger({
    level: globalOpts.verbose ? 'debug' : 'info',
    json: globalOpts.json,
  });
  const result = calculateChangeSet(graph, config, snapshots, { logger: log });

  const reports: ModuleReport[] = result.modules.map((mod) => {
    const summary = summarizeChangeSet(mod.actions);
    return {
      uuid: mod.uuid,
      snapshotId: mod.snapshotId,
      status: summary.actions === 0 ? 'up-to-date' : 'changed',
      summary,
    };
  });
  for (const failure of result.errors) {
    reports.push({ uuid: failure.uuid, status: 'failed', error: failure.error.message });
  }

  return { result, reports };
}
