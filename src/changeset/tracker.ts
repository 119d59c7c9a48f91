/**
 * Change set of one tracker module
 *
 * Runs the type system and work item reconciliation for a single snapshot
 * against its configured target module and assembles the ordered action
 * list: type system actions first, then work item actions, then the action
 * on the module itself.
 */

import type { LiveGraph, LiveModule } from '../model/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ChangeAction, TrackerConfig, TrackerSnapshot } from './types.js';
import type { ReconcileContext } from './context.js';
import { InvalidTrackerConfigError, MissingTargetModuleError } from './errors.js';
import { ReferenceResolver, uuidRef } from './references.js';
import { addExtension, coalesceActions, pruneVoidActions } from './merge.js';
import { slotOf } from './ledger.js';
import { dataTypeActions, requirementTypeActions, typesFolderCreateAction } from './types-folder.js';
import { WorkItemReconciler, specSlot } from './work-items.js';

export interface TrackerChangeOptions {
  logger?: Logger;
}

/**
 * Look up the target module of a tracker configuration
 *
 * @throws InvalidTrackerConfigError if the configuration has no module uuid
 * @throws MissingTargetModuleError if the live graph has no such module
 */
export function resolveTargetModule(graph: LiveGraph, config: TrackerConfig): LiveModule {
  if (config.uuid === undefined || config.uuid === '') {
    throw new InvalidTrackerConfigError('uuid');
  }
  const module = graph.moduleByUuid(config.uuid);
  if (module === undefined) {
    throw new MissingTargetModuleError(config.uuid);
  }
  return module;
}

/**
 * Calculate the change actions that bring one module in line with its
 * tracker snapshot
 *
 * Void actions are dropped. Running the result through an applier and
 * calculating again yields an empty list.
 *
 * @throws ChangeSetError on a broken configuration or snapshot
 */
export function calculateTrackerChange(
  graph: LiveGraph,
  snapshot: TrackerSnapshot,
  config: TrackerConfig,
  options: TrackerChangeOptions = {}
): ChangeAction[] {
  const module = resolveTargetModule(graph, config);
  const typesFolder = graph.typesFolder(module);
  const ctx: ReconcileContext = {
    graph,
    module,
    typesFolder,
    snapshot,
    resolver: new ReferenceResolver(graph, typesFolder),
    logger: (options.logger ?? defaultLogger).child({ module: module.uuid, snapshot: snapshot.id }),
  };

  const actions: ChangeAction[] = [];
  if (typesFolder === undefined) {
    ctx.logger.debug('Creating types folder');
    actions.push(typesFolderCreateAction(ctx));
  } else {
    actions.push(...dataTypeActions(ctx, typesFolder), ...requirementTypeActions(ctx, typesFolder));
  }

  const base: ChangeAction = { parent: uuidRef(module.uuid) };

  const reconciler = new WorkItemReconciler(ctx);
  const visited = new Set<string>();
  for (const item of snapshot.items) {
    const live = graph.workItemByIdentifier(module, item.id);
    if (live === undefined) {
      const created = reconciler.create(item);
      addExtension(base, specSlot(item), created.payload);
      actions.push(...created.actions);
      continue;
    }
    visited.add(item.id);
    const itemActions = reconciler.reconcile(live, item, module);
    if (live.parent.uuid !== module.uuid) {
      addExtension(base, slotOf(live), uuidRef(live.uuid));
    }
    actions.push(...itemActions);
  }

  reconciler.deleteUnvisited(base, [...module.folders, ...module.requirements], visited);
  actions.push(base);

  const result = coalesceActions(pruneVoidActions(actions));
  ctx.logger.debug('Calculated module change', { actions: result.length });
  return result;
}
