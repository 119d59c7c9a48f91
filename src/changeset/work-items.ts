/**
 * Work item tree reconciliation
 *
 * Walks the snapshot tree of one module against the live tree. New items
 * become nested creation payloads, existing items get modify actions, and
 * live items the snapshot no longer mentions are deleted from their parent.
 *
 * An item may move between parents. Its new parent extends it by uuid, and
 * any deletion already proposed on its old parent is retracted through the
 * `DeletionLedger`, so a live item is never both moved and deleted.
 */

import type { LiveAttributeValue, LiveContainer, LiveWorkItem } from '../model/types.js';
import { attributeValueType } from '../model/dump.js';
import type {
  AttributeModification,
  ChangeAction,
  CreatePayload,
  Modifications,
  Reference,
  RequirementTypeSpec,
  WorkItemSpec,
} from './types.js';
import type { ReconcileContext } from './context.js';
import { uuidRef } from './references.js';
import { addDeletion, addExtension } from './merge.js';
import { DeletionLedger, slotOf, type WorkItemSlot } from './ledger.js';
import { attributeDefinitionClass } from './types-folder.js';
import {
  isReservedAttribute,
  validateAttributeValue,
  type ValidatedAttributeValue,
} from './validate.js';

/**
 * Requirement type of a snapshot item, resolved against the snapshot
 */
interface ResolvedType {
  id: string;
  spec: RequirementTypeSpec;
  ref: Reference;
}

/**
 * Creation payload of a new item plus the actions its found descendants need
 */
export interface CreatedWorkItem {
  payload: CreatePayload;
  actions: ChangeAction[];
}

/**
 * Slot a snapshot item is created in
 */
export function specSlot(item: WorkItemSpec): WorkItemSlot {
  return item.kind === 'folder' ? 'folders' : 'requirements';
}

function sameScalar(live: LiveAttributeValue, wanted: ValidatedAttributeValue): boolean {
  if (live.kind === 'Enum' || wanted.kind === 'Enum') {
    return false;
  }
  if (wanted.value instanceof Date) {
    return live.value instanceof Date && live.value.getTime() === wanted.value.getTime();
  }
  return live.value === wanted.value;
}

function sameEnumSelection(live: LiveAttributeValue, wanted: ValidatedAttributeValue): boolean {
  if (live.kind !== 'Enum' || wanted.kind !== 'Enum') {
    return false;
  }
  const liveNames = new Set(live.values.map((value) => value.longName));
  const wantedNames = new Set(wanted.value);
  return liveNames.size === wantedNames.size && [...wantedNames].every((name) => liveNames.has(name));
}

export class WorkItemReconciler {
  readonly ledger = new DeletionLedger();
  /** Identifiers of live items found under a parent other than their live one */
  readonly relocated = new Set<string>();

  constructor(private readonly ctx: ReconcileContext) {}

  // ===========================================================================
  // Types and attributes
  // ===========================================================================

  private resolveType(item: WorkItemSpec): ResolvedType | undefined {
    if (item.type === undefined) {
      return undefined;
    }
    const spec = this.ctx.snapshot.requirementTypes.get(item.type);
    if (spec === undefined) {
      this.ctx.logger.warn('Faulty requirement in snapshot: unknown requirement type', {
        id: item.id,
        type: item.type,
      });
      return undefined;
    }
    return { id: item.type, spec, ref: this.ctx.resolver.requirementType(item.type) };
  }

  /**
   * Validated attribute values of an item, reserved pairs and names the
   * requirement type does not declare excluded.
   * Undefined when the item has attributes but no usable type, in which
   * case its attributes are left alone.
   *
   * @throws InvalidFieldValueError on an invalid value
   */
  private validatedAttributes(
    item: WorkItemSpec,
    type: ResolvedType | undefined
  ): Array<[string, ValidatedAttributeValue]> | undefined {
    const entries = [...item.attributes].filter(([name, value]) => !isReservedAttribute(name, value));
    if (type === undefined) {
      if (entries.length === 0) {
        return [];
      }
      if (item.type === undefined) {
        this.ctx.logger.error('Requirement without type but with attributes found', undefined, {
          id: item.id,
          attributes: entries.map(([name]) => name),
        });
      }
      return undefined;
    }

    const validated: Array<[string, ValidatedAttributeValue]> = [];
    for (const [name, value] of entries) {
      if (!type.spec.attributes.has(name)) {
        this.ctx.logger.warn('Attribute not declared on requirement type, skipped', {
          id: item.id,
          type: type.id,
          attribute: name,
        });
        continue;
      }
      validated.push([name, validateAttributeValue(name, value, type.spec, this.ctx.snapshot.dataTypes)]);
    }
    return validated;
  }

  private definitionReference(name: string, value: ValidatedAttributeValue, type: ResolvedType): Reference {
    return this.ctx.resolver.attributeDefinition(attributeDefinitionClass(value.kind), name, type.id);
  }

  private modificationValue(name: string, value: ValidatedAttributeValue): AttributeModification {
    if (value.kind === 'Enum') {
      return value.value.map((literal) => this.ctx.resolver.enumValue(name, literal));
    }
    return value.value;
  }

  private attributeCreatePayload(
    name: string,
    value: ValidatedAttributeValue,
    type: ResolvedType
  ): CreatePayload {
    return {
      _type: attributeValueType(value.kind),
      definition: this.definitionReference(name, value, type),
      [value.key]: this.modificationValue(name, value),
    };
  }

  // ===========================================================================
  // Creation
  // ===========================================================================

  /**
   * Creation payload of a snapshot item missing from the live tree
   *
   * Children that exist live are moved into the new item by uuid and
   * reconciled in place.
   */
  create(item: WorkItemSpec): CreatedWorkItem {
    const type = this.resolveType(item);
    const attributes = this.validatedAttributes(item, type);

    const payload: CreatePayload = {
      long_name: item.longName,
      identifier: item.id,
    };
    if (item.text !== undefined) {
      payload.text = item.text;
    }
    if (type !== undefined && attributes !== undefined && attributes.length > 0) {
      payload.attributes = attributes.map(([name, value]) =>
        this.attributeCreatePayload(name, value, type)
      );
    }
    if (type !== undefined) {
      payload.type = type.ref;
    }

    const actions: ChangeAction[] = [];
    if (item.kind === 'folder') {
      const slots: Record<WorkItemSlot, Array<CreatePayload | Reference>> = {
        requirements: [],
        folders: [],
      };
      for (const child of item.children) {
        const live = this.ctx.graph.workItemByIdentifier(this.ctx.module, child.id);
        if (live === undefined) {
          const created = this.create(child);
          slots[specSlot(child)].push(created.payload);
          actions.push(...created.actions);
        } else {
          slots[slotOf(live)].push(uuidRef(live.uuid));
          actions.push(...this.reconcile(live, child, undefined));
        }
      }
      if (slots.requirements.length > 0) {
        payload.requirements = slots.requirements;
      }
      if (slots.folders.length > 0) {
        payload.folders = slots.folders;
      }
    }

    return { payload, actions };
  }

  // ===========================================================================
  // Modification
  // ===========================================================================

  private attributeChanges(
    action: ChangeAction,
    live: LiveWorkItem,
    attributes: Array<[string, ValidatedAttributeValue]>,
    type: ResolvedType | undefined
  ): Record<string, AttributeModification> {
    const modifications: Record<string, AttributeModification> = {};
    const kept = new Set<string>();

    if (type !== undefined) {
      for (const [name, value] of attributes) {
        const definition = this.definitionReference(name, value, type);
        const current =
          definition.kind === 'uuid'
            ? live.attributes.find((attr) => attr.definition?.uuid === definition.uuid)
            : undefined;

        if (current === undefined || current.kind !== value.kind) {
          // Value classes cannot change in place; an unmatched live value is deleted below
          addExtension(action, 'attributes', this.attributeCreatePayload(name, value, type));
          continue;
        }
        kept.add(current.uuid);
        const same = value.kind === 'Enum' ? sameEnumSelection(current, value) : sameScalar(current, value);
        if (!same) {
          modifications[name] = this.modificationValue(name, value);
        }
      }
    }

    for (const attr of live.attributes) {
      if (!kept.has(attr.uuid)) {
        addDeletion(action, 'attributes', uuidRef(attr.uuid));
      }
    }
    return modifications;
  }

  private modifications(
    action: ChangeAction,
    live: LiveWorkItem,
    item: WorkItemSpec
  ): Modifications {
    const mods: Modifications = {};
    if (live.longName !== item.longName) {
      mods.long_name = item.longName;
    }
    if (item.text !== undefined && (live.text ?? '') !== item.text) {
      mods.text = item.text;
    }

    const type = this.resolveType(item);
    if (item.type !== live.type?.identifier) {
      if (item.type === undefined) {
        mods.type = null;
      } else if (type !== undefined) {
        mods.type = type.ref;
      }
    }

    const attributes = this.validatedAttributes(item, type);
    if (attributes !== undefined) {
      const changed = this.attributeChanges(action, live, attributes, type);
      if (Object.keys(changed).length > 0) {
        mods.attributes = changed;
      }
    }
    return mods;
  }

  /**
   * Actions bringing a found live item and its subtree in line with the
   * snapshot item
   *
   * @param expectedParent - container the snapshot places the item in;
   *   undefined while that container is itself being created
   */
  reconcile(
    live: LiveWorkItem,
    item: WorkItemSpec,
    expectedParent: LiveContainer | undefined
  ): ChangeAction[] {
    const action: ChangeAction = { parent: uuidRef(live.uuid) };
    const mods = this.modifications(action, live, item);
    if (Object.keys(mods).length > 0) {
      action.modify = mods;
    }

    if (expectedParent === undefined || live.parent.uuid !== expectedParent.uuid) {
      this.relocated.add(live.identifier);
      this.ledger.retract(live);
    }

    const childActions: ChangeAction[] = [];
    if (live.kind === 'folder') {
      const visited = new Set<string>();
      if (item.kind === 'folder') {
        for (const child of item.children) {
          visited.add(child.id);
          const found = this.ctx.graph.workItemByIdentifier(this.ctx.module, child.id);
          if (found === undefined) {
            const created = this.create(child);
            addExtension(action, specSlot(child), created.payload);
            childActions.push(...created.actions);
            continue;
          }
          const actions = this.reconcile(found, child, live);
          if (found.parent.uuid !== live.uuid) {
            addExtension(action, slotOf(found), uuidRef(found.uuid));
          }
          childActions.push(...actions);
        }
      }
      this.deleteUnvisited(action, [...live.folders, ...live.requirements], visited);
    } else if (item.kind === 'folder' && item.children.length > 0) {
      this.ctx.logger.warn('Snapshot folder is a requirement in the model, children skipped', {
        id: item.id,
        uuid: live.uuid,
      });
    }

    return [action, ...childActions];
  }

  /**
   * Delete live children that were neither visited nor moved elsewhere
   */
  deleteUnvisited(
    action: ChangeAction,
    children: readonly LiveWorkItem[],
    visited: ReadonlySet<string>
  ): void {
    for (const child of children) {
      if (visited.has(child.identifier) || this.relocated.has(child.identifier)) {
        continue;
      }
      addDeletion(action, slotOf(child), uuidRef(child.uuid));
      this.ledger.propose(child, action);
    }
  }
}
