/**
 * Action assembly
 *
 * Change actions are built from partial fragments produced at different
 * scopes. Merging is in place: non-empty mappings merge key by key, every
 * other value overwrites. Actions without any change are void and never
 * reach the final list; adjacent actions on the same parent are folded
 * into one.
 */

import type {
  ActionFragment,
  AttributeModification,
  ChangeAction,
  ExtendEntry,
  Modifications,
  Reference,
} from './types.js';
import { sameReference } from './references.js';

function hasEntries(map: object | undefined): boolean {
  return map !== undefined && Object.keys(map).length > 0;
}

/**
 * An action is void when it carries nothing but its parent
 */
export function isVoidAction(action: ChangeAction): boolean {
  return !hasEntries(action.extend) && !hasEntries(action.modify) && !hasEntries(action.delete);
}

/**
 * Drop void actions, keeping the order of the rest
 */
export function pruneVoidActions(actions: readonly ChangeAction[]): ChangeAction[] {
  return actions.filter((action) => !isVoidAction(action));
}

/**
 * Append an entry to `action.extend[slot]`, creating the slot if needed
 */
export function addExtension(action: ChangeAction, slot: string, entry: ExtendEntry): void {
  const extend = (action.extend ??= {});
  (extend[slot] ??= []).push(entry);
}

/**
 * Append a reference to `action.delete[slot]`, creating the slot if needed
 */
export function addDeletion(action: ChangeAction, slot: string, ref: Reference): void {
  const deletions = (action.delete ??= {});
  (deletions[slot] ??= []).push(ref);
}

function mergeSlots<T>(
  target: Record<string, T[]> | undefined,
  overrides: Record<string, T[]> | undefined
): Record<string, T[]> | undefined {
  if (overrides === undefined || !hasEntries(overrides)) {
    return target;
  }
  return { ...target, ...overrides };
}

function mergeAttributeModifications(
  target: Record<string, AttributeModification> | undefined,
  overrides: Record<string, AttributeModification> | undefined
): Record<string, AttributeModification> | undefined {
  if (overrides === undefined || !hasEntries(overrides)) {
    return target;
  }
  return { ...target, ...overrides };
}

function mergeModifications(
  target: Modifications | undefined,
  overrides: Modifications | undefined
): Modifications | undefined {
  if (overrides === undefined || !hasEntries(overrides)) {
    return target;
  }
  const { attributes, ...fields } = overrides;
  const merged: Modifications = { ...target, ...fields };
  const mergedAttributes = mergeAttributeModifications(target?.attributes, attributes);
  if (mergedAttributes !== undefined) {
    merged.attributes = mergedAttributes;
  }
  return merged;
}

/**
 * Deep-merge `fragment` into `action` in place
 *
 * Merging the same fragment twice leaves the action unchanged.
 */
export function mergeAction(action: ChangeAction, fragment: ActionFragment): ChangeAction {
  const extend = mergeSlots(action.extend, fragment.extend);
  if (extend !== undefined) {
    action.extend = extend;
  }
  const modify = mergeModifications(action.modify, fragment.modify);
  if (modify !== undefined) {
    action.modify = modify;
  }
  const deletions = mergeSlots(action.delete, fragment.delete);
  if (deletions !== undefined) {
    action.delete = deletions;
  }
  return action;
}

function overlaps(a: object | undefined, b: object | undefined): boolean {
  if (a === undefined || b === undefined) {
    return false;
  }
  return Object.keys(b).some((key) => key in a);
}

function canCoalesce(target: ChangeAction, next: ChangeAction): boolean {
  return (
    sameReference(target.parent, next.parent) &&
    !overlaps(target.extend, next.extend) &&
    !overlaps(target.modify, next.modify) &&
    !overlaps(target.delete, next.delete)
  );
}

/**
 * Fold each action into its predecessor when both target the same parent
 * and touch disjoint slots and fields
 */
export function coalesceActions(actions: readonly ChangeAction[]): ChangeAction[] {
  const result: ChangeAction[] = [];
  for (const action of actions) {
    const previous = result[result.length - 1];
    if (previous !== undefined && canCoalesce(previous, action)) {
      mergeAction(previous, action);
    } else {
      result.push(action);
    }
  }
  return result;
}
