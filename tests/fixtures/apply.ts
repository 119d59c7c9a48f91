/**
 * In-process applier for change sets
 *
 * Applies actions to a model dump the way the persistent applier does:
 * actions in order, and within an action `extend`, then `modify`, then
 * `delete`. Created elements get fresh uuids (`new-1`, `new-2`, ...) and
 * their `promise_id` labels resolve later promise references.
 */

import type {
  AttributeDefinitionDump,
  AttributeValueDump,
  DataTypeDefinitionDump,
  EnumValueDump,
  FolderDump,
  ModelDump,
  ModuleDump,
  RequirementDump,
  RequirementTypeDump,
  TypesFolderDump,
} from '../../src/model/dump.js';
import { attributeValueType } from '../../src/model/dump.js';
import { ATTRIBUTE_KINDS, type AttributeKind, type ScalarValue } from '../../src/model/types.js';
import type {
  AttributeModification,
  ChangeAction,
  CreatePayload,
  Modifications,
  PayloadValue,
  Reference,
} from '../../src/changeset/types.js';
import { isReference } from '../../src/changeset/references.js';

type Node =
  | { kind: 'module'; dump: ModuleDump }
  | { kind: 'typesFolder'; dump: TypesFolderDump }
  | { kind: 'dataType'; dump: DataTypeDefinitionDump }
  | { kind: 'enumValue'; dump: EnumValueDump }
  | { kind: 'requirementType'; dump: RequirementTypeDump }
  | { kind: 'attributeDefinition'; dump: AttributeDefinitionDump }
  | { kind: 'folder'; dump: FolderDump }
  | { kind: 'requirement'; dump: RequirementDump }
  | { kind: 'attributeValue'; dump: AttributeValueDump };

interface Placement {
  parent: string;
  slot: string;
}

function isPayload(value: PayloadValue | undefined): value is CreatePayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !isReference(value)
  );
}

function entries(payload: CreatePayload, key: string): readonly PayloadValue[] {
  const value = payload[key];
  return Array.isArray(value) ? value : [];
}

function stringField(payload: CreatePayload, key: string): string | undefined {
  const value = payload[key];
  return typeof value === 'string' ? value : undefined;
}

function requireField(payload: CreatePayload, key: string): string {
  const value = stringField(payload, key);
  if (value === undefined) {
    throw new Error(`Payload without ${key}: ${JSON.stringify(payload)}`);
  }
  return value;
}

function scalarField(value: PayloadValue | undefined): ScalarValue | null {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return null;
}

function drop<T extends { uuid: string }>(list: T[], uuid: string): boolean {
  const index = list.findIndex((entry) => entry.uuid === uuid);
  if (index < 0) {
    return false;
  }
  list.splice(index, 1);
  return true;
}

export class TestApplier {
  readonly model: ModelDump;
  private readonly nodes = new Map<string, Node>();
  private readonly placements = new Map<string, Placement>();
  private readonly promises = new Map<string, string>();
  private counter = 0;

  constructor(model: ModelDump) {
    this.model = structuredClone(model);
    for (const mod of this.model.modules) {
      this.indexModule(mod);
    }
  }

  // ===========================================================================
  // Indexing
  // ===========================================================================

  private register(node: Node, parent?: string, slot?: string): void {
    this.nodes.set(node.dump.uuid, node);
    if (parent !== undefined && slot !== undefined) {
      this.placements.set(node.dump.uuid, { parent, slot });
    }
  }

  private indexModule(mod: ModuleDump): void {
    this.register({ kind: 'module', dump: mod });
    for (const folder of mod.types_folders) {
      this.register({ kind: 'typesFolder', dump: folder }, mod.uuid, 'requirement_types_folders');
      for (const dtdef of folder.data_type_definitions) {
        this.register({ kind: 'dataType', dump: dtdef }, folder.uuid, 'data_type_definitions');
        for (const value of dtdef.values) {
          this.register({ kind: 'enumValue', dump: value }, dtdef.uuid, 'values');
        }
      }
      for (const reqtype of folder.requirement_types) {
        this.register({ kind: 'requirementType', dump: reqtype }, folder.uuid, 'requirement_types');
        for (const adef of reqtype.attribute_definitions) {
          this.register({ kind: 'attributeDefinition', dump: adef }, reqtype.uuid, 'attribute_definitions');
        }
      }
    }
    this.indexItems(mod.uuid, mod.folders, mod.requirements);
  }

  private indexItems(parent: string, folders: FolderDump[], requirements: RequirementDump[]): void {
    for (const folder of folders) {
      this.register({ kind: 'folder', dump: folder }, parent, 'folders');
      this.indexAttributes(folder);
      this.indexItems(folder.uuid, folder.folders, folder.requirements);
    }
    for (const req of requirements) {
      this.register({ kind: 'requirement', dump: req }, parent, 'requirements');
      this.indexAttributes(req);
    }
  }

  private indexAttributes(item: RequirementDump): void {
    for (const attr of item.attributes) {
      this.register({ kind: 'attributeValue', dump: attr }, item.uuid, 'attributes');
    }
  }

  // ===========================================================================
  // References
  // ===========================================================================

  private resolve(ref: Reference): string {
    if (ref.kind === 'uuid') {
      return ref.uuid;
    }
    const uuid = this.promises.get(ref.label);
    if (uuid === undefined) {
      throw new Error(`Unresolved promise: ${ref.label}`);
    }
    return uuid;
  }

  private node(ref: Reference): Node {
    const uuid = this.resolve(ref);
    const found = this.nodes.get(uuid);
    if (found === undefined) {
      throw new Error(`Unknown element: ${uuid}`);
    }
    return found;
  }

  private optionalRef(value: PayloadValue | undefined): string | undefined {
    return isReference(value) ? this.resolve(value) : undefined;
  }

  private refList(values: readonly PayloadValue[]): string[] {
    return values.filter(isReference).map((ref) => this.resolve(ref));
  }

  // ===========================================================================
  // Placement
  // ===========================================================================

  private attach(parent: Node, slot: string, child: Node): void {
    const uuid = child.dump.uuid;
    this.placements.set(uuid, { parent: parent.dump.uuid, slot });

    if (parent.kind === 'module') {
      if (slot === 'requirement_types_folders' && child.kind === 'typesFolder') {
        parent.dump.types_folders.push(child.dump);
        return;
      }
      if (slot === 'folders' && child.kind === 'folder') {
        parent.dump.folders.push(child.dump);
        return;
      }
      if (slot === 'requirements' && child.kind === 'requirement') {
        parent.dump.requirements.push(child.dump);
        return;
      }
    }
    if (parent.kind === 'folder') {
      if (slot === 'folders' && child.kind === 'folder') {
        parent.dump.folders.push(child.dump);
        return;
      }
      if (slot === 'requirements' && child.kind === 'requirement') {
        parent.dump.requirements.push(child.dump);
        return;
      }
    }
    if ((parent.kind === 'folder' || parent.kind === 'requirement') && slot === 'attributes') {
      if (child.kind === 'attributeValue') {
        parent.dump.attributes.push(child.dump);
        return;
      }
    }
    if (parent.kind === 'typesFolder') {
      if (slot === 'data_type_definitions' && child.kind === 'dataType') {
        parent.dump.data_type_definitions.push(child.dump);
        return;
      }
      if (slot === 'requirement_types' && child.kind === 'requirementType') {
        parent.dump.requirement_types.push(child.dump);
        return;
      }
    }
    if (parent.kind === 'dataType' && slot === 'values' && child.kind === 'enumValue') {
      parent.dump.values.push(child.dump);
      return;
    }
    if (
      parent.kind === 'requirementType' &&
      slot === 'attribute_definitions' &&
      child.kind === 'attributeDefinition'
    ) {
      parent.dump.attribute_definitions.push(child.dump);
      return;
    }
    throw new Error(`Cannot place ${child.kind} in ${parent.kind}.${slot}`);
  }

  private detach(uuid: string): void {
    const placement = this.placements.get(uuid);
    const parent = placement === undefined ? undefined : this.nodes.get(placement.parent);
    if (placement === undefined || parent === undefined) {
      throw new Error(`Element has no parent: ${uuid}`);
    }
    this.placements.delete(uuid);

    const { slot } = placement;
    let removed = false;
    switch (parent.kind) {
      case 'module':
        removed =
          (slot === 'folders' && drop(parent.dump.folders, uuid)) ||
          (slot === 'requirements' && drop(parent.dump.requirements, uuid)) ||
          (slot === 'requirement_types_folders' && drop(parent.dump.types_folders, uuid));
        break;
      case 'folder':
        removed =
          (slot === 'folders' && drop(parent.dump.folders, uuid)) ||
          (slot === 'requirements' && drop(parent.dump.requirements, uuid)) ||
          (slot === 'attributes' && drop(parent.dump.attributes, uuid));
        break;
      case 'requirement':
        removed = slot === 'attributes' && drop(parent.dump.attributes, uuid);
        break;
      case 'typesFolder':
        removed =
          (slot === 'data_type_definitions' && drop(parent.dump.data_type_definitions, uuid)) ||
          (slot === 'requirement_types' && drop(parent.dump.requirement_types, uuid));
        break;
      case 'dataType':
        removed = slot === 'values' && drop(parent.dump.values, uuid);
        break;
      case 'requirementType':
        removed = slot === 'attribute_definitions' && drop(parent.dump.attribute_definitions, uuid);
        break;
      default:
        break;
    }
    if (!removed) {
      throw new Error(`Cannot remove ${uuid} from ${parent.kind}.${slot}`);
    }
  }

  private move(ref: Reference, parent: Node, slot: string): void {
    const child = this.node(ref);
    this.detach(child.dump.uuid);
    this.attach(parent, slot, child);
  }

  // ===========================================================================
  // Creation
  // ===========================================================================

  private newUuid(): string {
    this.counter++;
    return `new-${this.counter}`;
  }

  private extend(parent: Node, slot: string, entry: PayloadValue): void {
    if (isReference(entry)) {
      this.move(entry, parent, slot);
      return;
    }
    if (!isPayload(entry)) {
      throw new Error(`Unsupported extend entry in ${slot}`);
    }
    const child = this.build(slot, entry);
    const promise = stringField(entry, 'promise_id');
    if (promise !== undefined) {
      this.promises.set(promise, child.dump.uuid);
    }
    this.nodes.set(child.dump.uuid, child);
    this.attach(parent, slot, child);
    this.buildChildren(child, entry);
  }

  private build(slot: string, payload: CreatePayload): Node {
    const uuid = this.newUuid();
    const longName = stringField(payload, 'long_name') ?? '';
    switch (slot) {
      case 'requirement_types_folders':
        return {
          kind: 'typesFolder',
          dump: {
            uuid,
            identifier: requireField(payload, 'identifier'),
            long_name: longName,
            data_type_definitions: [],
            requirement_types: [],
          },
        };
      case 'data_type_definitions':
        return { kind: 'dataType', dump: { uuid, long_name: longName, values: [] } };
      case 'values':
        return { kind: 'enumValue', dump: { uuid, long_name: longName } };
      case 'requirement_types':
        return {
          kind: 'requirementType',
          dump: {
            uuid,
            identifier: requireField(payload, 'identifier'),
            long_name: longName,
            attribute_definitions: [],
          },
        };
      case 'attribute_definitions':
        return { kind: 'attributeDefinition', dump: this.buildAttributeDefinition(uuid, payload) };
      case 'attributes':
        return { kind: 'attributeValue', dump: this.buildAttributeValue(uuid, payload) };
      case 'folders':
        return {
          kind: 'folder',
          dump: { ...this.buildItem(uuid, payload), folders: [], requirements: [] },
        };
      case 'requirements':
        return { kind: 'requirement', dump: this.buildItem(uuid, payload) };
      default:
        throw new Error(`Unknown slot: ${slot}`);
    }
  }

  private buildAttributeDefinition(uuid: string, payload: CreatePayload): AttributeDefinitionDump {
    const cls = payload._type;
    const base = {
      uuid,
      identifier: requireField(payload, 'identifier'),
      long_name: stringField(payload, 'long_name') ?? '',
    };
    if (cls === 'AttributeDefinitionEnumeration') {
      return {
        ...base,
        _type: cls,
        data_type: this.optionalRef(payload.data_type),
        multi_valued: payload.multi_valued === true,
      };
    }
    return { ...base, _type: 'AttributeDefinition' };
  }

  private buildAttributeValue(uuid: string, payload: CreatePayload): AttributeValueDump {
    const kind = ATTRIBUTE_KINDS.find((candidate: AttributeKind) => attributeValueType(candidate) === payload._type);
    if (kind === undefined) {
      throw new Error(`Unknown attribute value type: ${String(payload._type)}`);
    }
    const dump: AttributeValueDump = {
      uuid,
      _type: attributeValueType(kind),
      definition: this.optionalRef(payload.definition),
    };
    if (kind === 'Enum') {
      dump.values = this.refList(entries(payload, 'values'));
    } else {
      dump.value = scalarField(payload.value);
    }
    return dump;
  }

  private buildItem(uuid: string, payload: CreatePayload): RequirementDump {
    const item: RequirementDump = {
      uuid,
      identifier: requireField(payload, 'identifier'),
      long_name: stringField(payload, 'long_name') ?? '',
      attributes: [],
    };
    const text = stringField(payload, 'text');
    if (text !== undefined) {
      item.text = text;
    }
    const type = this.optionalRef(payload.type);
    if (type !== undefined) {
      item.type = type;
    }
    return item;
  }

  private buildChildren(node: Node, payload: CreatePayload): void {
    const slots: Record<Node['kind'], readonly string[]> = {
      module: [],
      typesFolder: ['data_type_definitions', 'requirement_types'],
      dataType: ['values'],
      enumValue: [],
      requirementType: ['attribute_definitions'],
      attributeDefinition: [],
      folder: ['attributes', 'folders', 'requirements'],
      requirement: ['attributes'],
      attributeValue: [],
    };
    for (const slot of slots[node.kind]) {
      for (const entry of entries(payload, slot)) {
        this.extend(node, slot, entry);
      }
    }
  }

  // ===========================================================================
  // Modification
  // ===========================================================================

  private definitionName(uuid: string | undefined): string | undefined {
    const definition = uuid === undefined ? undefined : this.nodes.get(uuid);
    return definition?.kind === 'attributeDefinition' ? definition.dump.long_name : undefined;
  }

  private modifyAttributes(
    item: RequirementDump,
    attributes: Record<string, AttributeModification>
  ): void {
    for (const [name, value] of Object.entries(attributes)) {
      const attr = item.attributes.find((candidate) => this.definitionName(candidate.definition) === name);
      if (attr === undefined) {
        throw new Error(`No attribute ${name} on ${item.uuid}`);
      }
      if (Array.isArray(value)) {
        attr.values = this.refList(value);
      } else {
        attr.value = scalarField(value);
      }
    }
  }

  private modify(node: Node, mods: Modifications): void {
    if (mods.long_name !== undefined && node.kind !== 'attributeValue') {
      node.dump.long_name = mods.long_name;
    }
    if (node.kind === 'folder' || node.kind === 'requirement') {
      if (mods.text !== undefined) {
        node.dump.text = mods.text;
      }
      if (mods.type === null) {
        delete node.dump.type;
      } else if (mods.type !== undefined) {
        node.dump.type = this.resolve(mods.type);
      }
      if (mods.attributes !== undefined) {
        this.modifyAttributes(node.dump, mods.attributes);
      }
    }
    if (node.kind === 'attributeDefinition') {
      if (mods.data_type !== undefined) {
        node.dump.data_type = this.resolve(mods.data_type);
      }
      if (mods.multi_valued !== undefined) {
        node.dump.multi_valued = mods.multi_valued;
      }
    }
  }

  // ===========================================================================
  // Actions
  // ===========================================================================

  applyAction(action: ChangeAction): void {
    const parent = this.node(action.parent);
    for (const [slot, list] of Object.entries(action.extend ?? {})) {
      for (const entry of list) {
        this.extend(parent, slot, entry);
      }
    }
    if (action.modify !== undefined) {
      this.modify(parent, action.modify);
    }
    for (const refs of Object.values(action.delete ?? {})) {
      for (const ref of refs) {
        this.detach(this.resolve(ref));
      }
    }
  }

  apply(actions: readonly ChangeAction[]): ModelDump {
    for (const action of actions) {
      this.applyAction(action);
    }
    return this.model;
  }
}

/**
 * Apply a change set to a copy of `model`
 */
export function applyChangeSet(model: ModelDump, actions: readonly ChangeAction[]): ModelDump {
  return new TestApplier(model).apply(actions);
}
