/**
 * Deletion ledger
 *
 * Remembers which change action currently proposes the deletion of a live
 * work item, so that the deletion can be taken back once the traversal
 * finds the item under a different parent.
 */

import type { LiveWorkItem } from '../model/types.js';
import type { ChangeAction } from './types.js';

/**
 * Deletion slot of a work item on its parent
 */
export type WorkItemSlot = 'requirements' | 'folders';

export function slotOf(item: Pick<LiveWorkItem, 'kind'>): WorkItemSlot {
  return item.kind === 'folder' ? 'folders' : 'requirements';
}

interface ProposedDeletion {
  action: ChangeAction;
  slot: WorkItemSlot;
}

export class DeletionLedger {
  private readonly proposals = new Map<string, ProposedDeletion>();

  /**
   * Record that `action` deletes `item` from `slot`
   */
  propose(item: LiveWorkItem, action: ChangeAction, slot: WorkItemSlot = slotOf(item)): void {
    this.proposals.set(item.uuid, { action, slot });
  }

  /**
   * Take back the proposed deletion of `item`, if there is one
   *
   * Empty slots and an empty `delete` mapping are removed from the action.
   *
   * @returns whether a deletion was retracted
   */
  retract(item: LiveWorkItem): boolean {
    const proposal = this.proposals.get(item.uuid);
    if (proposal === undefined) {
      return false;
    }
    this.proposals.delete(item.uuid);

    const { action, slot } = proposal;
    const deletions = action.delete;
    const refs = deletions?.[slot];
    if (deletions === undefined || refs === undefined) {
      return false;
    }

    const remaining = refs.filter((ref) => ref.kind !== 'uuid' || ref.uuid !== item.uuid);
    if (remaining.length > 0) {
      deletions[slot] = remaining;
    } else {
      delete deletions[slot];
    }
    if (Object.keys(deletions).length === 0) {
      delete action.delete;
    }
    return remaining.length < refs.length;
  }

  /**
   * Whether a deletion of `item` is currently proposed
   */
  isProposed(item: Pick<LiveWorkItem, 'uuid'>): boolean {
    return this.proposals.has(item.uuid);
  }

  get size(): number {
    return this.proposals.size;
  }
}
