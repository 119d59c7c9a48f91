/**
 * Change set summary counts for reporting
 */

import type { ChangeAction, PayloadValue } from './types.js';
import { isReference } from './references.js';

export interface ChangeSetSummary {
  /** Number of actions */
  actions: number;
  /** Elements created, nested children included */
  created: number;
  /** Live elements moved under a new parent */
  moved: number;
  /** Actions modifying their parent element */
  modified: number;
  /** Live elements deleted (subtrees count once) */
  deleted: number;
}

function countNested(value: PayloadValue): number {
  if (Array.isArray(value)) {
    return value.reduce<number>((sum, entry) => sum + countNested(entry), 0);
  }
  if (typeof value !== 'object' || value === null || value instanceof Date || isReference(value)) {
    return 0;
  }
  let count = 1;
  for (const field of Object.values(value)) {
    count += countNested(field);
  }
  return count;
}

export function summarizeChangeSet(actions: readonly ChangeAction[]): ChangeSetSummary {
  const summary: ChangeSetSummary = {
    actions: actions.length,
    created: 0,
    moved: 0,
    modified: 0,
    deleted: 0,
  };

  for (const action of actions) {
    for (const entries of Object.values(action.extend ?? {})) {
      for (const entry of entries) {
        if (isReference(entry)) {
          summary.moved++;
        } else {
          summary.created += countNested(entry);
        }
      }
    }
    if (action.modify !== undefined && Object.keys(action.modify).length > 0) {
      summary.modified++;
    }
    for (const refs of Object.values(action.delete ?? {})) {
      summary.deleted += refs.length;
    }
  }

  return summary;
}
