/**
 * Change set calculation
 *
 * Pairs every configured module with its tracker snapshot and collects the
 * change actions of all modules into one ordered list. A module whose
 * configuration or snapshot is broken contributes no actions and is
 * reported in `errors`; the other modules are unaffected.
 */

import type { LiveGraph } from '../model/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ChangeAction, SyncConfig, TrackerConfig, TrackerSnapshot } from './types.js';
import { isChangeSetError, type ChangeSetError } from './errors.js';
import { calculateTrackerChange } from './tracker.js';

export interface ChangeSetOptions {
  logger?: Logger;
}

/**
 * Actions calculated for one configured module
 */
export interface ModuleChange {
  /** Index of the module in the configuration */
  index: number;
  uuid?: string;
  snapshotId: string;
  actions: ChangeAction[];
}

/**
 * Module skipped because of a broken configuration or snapshot
 */
export interface ModuleError {
  index: number;
  uuid?: string;
  error: ChangeSetError;
}

export interface ChangeSetResult {
  /** Actions of all modules, in configuration order */
  actions: ChangeAction[];
  modules: ModuleChange[];
  errors: ModuleError[];
}

/**
 * Find the snapshot of a configured module
 *
 * A module with an `externalId` pairs with the snapshot of that id; one
 * without pairs with the snapshot at its own position.
 */
export function pairSnapshot(
  config: TrackerConfig,
  index: number,
  snapshots: readonly TrackerSnapshot[]
): TrackerSnapshot | undefined {
  if (config.externalId !== undefined) {
    return snapshots.find((snapshot) => snapshot.id === config.externalId);
  }
  return snapshots[index];
}

/**
 * Calculate the change set of every configured module
 *
 * Errors other than `ChangeSetError` are not expected and propagate.
 */
export function calculateChangeSet(
  graph: LiveGraph,
  config: SyncConfig,
  snapshots: readonly TrackerSnapshot[],
  options: ChangeSetOptions = {}
): ChangeSetResult {
  const log = options.logger ?? defaultLogger;
  const result: ChangeSetResult = { actions: [], modules: [], errors: [] };

  config.modules.forEach((tracker, index) => {
    const snapshot = pairSnapshot(tracker, index, snapshots);
    if (snapshot === undefined) {
      log.warn('No snapshot for configured module', {
        index,
        uuid: tracker.uuid,
        externalId: tracker.externalId,
      });
      return;
    }

    try {
      const actions = calculateTrackerChange(graph, snapshot, tracker, { logger: log });
      result.modules.push({ index, uuid: tracker.uuid, snapshotId: snapshot.id, actions });
      result.actions.push(...actions);
    } catch (error) {
      if (!isChangeSetError(error)) {
        throw error;
      }
      log.error('Skipping tracker', error, { index, uuid: tracker.uuid });
      result.errors.push({ index, uuid: tracker.uuid, error });
    }
  });

  return result;
}

export { calculateTrackerChange, resolveTargetModule } from './tracker.js';
export type { TrackerChangeOptions } from './tracker.js';
export * from './errors.js';
export * from './types.js';
export {
  formatReference,
  isReference,
  promiseRef,
  sameReference,
  uuidRef,
  ReferenceResolver,
} from './references.js';
export { isVoidAction, mergeAction, pruneVoidActions } from './merge.js';
export { DeletionLedger } from './ledger.js';
export { validateAttributeValue, isReservedAttribute } from './validate.js';
export type { ValidatedAttributeValue } from './validate.js';
