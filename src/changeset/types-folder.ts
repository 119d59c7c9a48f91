/**
 * Type system reconciliation
 *
 * Brings the module's types folder in line with the data types and
 * requirement types of the snapshot. Its actions come before all work item
 * actions so that attribute definitions and values can promise-reference
 * definitions created in the same batch.
 */

import type {
  AttributeDefinitionClass,
  LiveEnumAttributeDefinition,
  LiveRequirementType,
  LiveTypesFolder,
} from '../model/types.js';
import type {
  AttributeDefinitionSpec,
  AttributeKind,
  ChangeAction,
  CreatePayload,
  Modifications,
  Reference,
  RequirementTypeSpec,
} from './types.js';
import type { ReconcileContext } from './context.js';
import {
  DATA_TYPE_DEFINITION_CLASS,
  attributeDefinitionIdentifier,
  attributeDefinitionLabel,
  dataTypeLabel,
  enumValueLabel,
  requirementTypeLabel,
  uuidRef,
} from './references.js';
import { addDeletion, addExtension, isVoidAction } from './merge.js';

/** Long name of a created types folder */
export const TYPES_FOLDER_NAME = 'Types';

/** Identifier of a created types folder */
export const TYPES_FOLDER_IDENTIFIER = '-2';

/**
 * Class of the attribute definition that stores values of `kind`
 */
export function attributeDefinitionClass(kind: AttributeKind): AttributeDefinitionClass {
  return kind === 'Enum' ? 'AttributeDefinitionEnumeration' : 'AttributeDefinition';
}

// =============================================================================
// Creation payloads
// =============================================================================

function enumValuePayload(dataTypeName: string, value: string): CreatePayload {
  return { long_name: value, promise_id: enumValueLabel(dataTypeName, value) };
}

/**
 * Payload creating an enumeration data type definition with its literals
 */
export function dataTypeCreatePayload(name: string, values: readonly string[]): CreatePayload {
  return {
    long_name: name,
    values: values.map((value) => enumValuePayload(name, value)),
    promise_id: dataTypeLabel(name),
    _type: DATA_TYPE_DEFINITION_CLASS,
  };
}

/**
 * Reference to the data type definition an Enum attribute `name` uses.
 * Undefined when the snapshot does not declare that data type.
 */
function dataTypeReference(ctx: ReconcileContext, name: string): Reference | undefined {
  if (!ctx.snapshot.dataTypes.has(name)) {
    ctx.logger.warn('Enum attribute definition without data type in snapshot', {
      attribute: name,
    });
    return undefined;
  }
  return ctx.resolver.dataType(name);
}

/**
 * Payload creating an attribute definition of requirement type `reqTypeId`
 */
export function attributeDefinitionCreatePayload(
  ctx: ReconcileContext,
  name: string,
  spec: AttributeDefinitionSpec,
  reqTypeId: string
): CreatePayload {
  const cls = attributeDefinitionClass(spec.kind);
  const payload: CreatePayload = {
    long_name: name,
    identifier: attributeDefinitionIdentifier(name, reqTypeId),
  };
  if (spec.kind === 'Enum') {
    const dataType = dataTypeReference(ctx, name);
    if (dataType !== undefined) {
      payload.data_type = dataType;
    }
    payload.multi_valued = spec.multiValued;
  }
  payload._type = cls;
  payload.promise_id = attributeDefinitionLabel(cls, name, reqTypeId);
  return payload;
}

/**
 * Payload creating a requirement type with its attribute definitions
 */
export function requirementTypeCreatePayload(
  ctx: ReconcileContext,
  identifier: string,
  spec: RequirementTypeSpec
): CreatePayload {
  return {
    identifier,
    long_name: spec.longName,
    promise_id: requirementTypeLabel(identifier),
    attribute_definitions: Array.from(spec.attributes, ([name, adef]) =>
      attributeDefinitionCreatePayload(ctx, name, adef, identifier)
    ),
  };
}

/**
 * Action creating the whole types folder below the module
 */
export function typesFolderCreateAction(ctx: ReconcileContext): ChangeAction {
  const folder: CreatePayload = {
    long_name: TYPES_FOLDER_NAME,
    identifier: TYPES_FOLDER_IDENTIFIER,
    data_type_definitions: Array.from(ctx.snapshot.dataTypes, ([name, values]) =>
      dataTypeCreatePayload(name, values)
    ),
    requirement_types: Array.from(ctx.snapshot.requirementTypes, ([identifier, spec]) =>
      requirementTypeCreatePayload(ctx, identifier, spec)
    ),
  };
  return {
    parent: uuidRef(ctx.module.uuid),
    extend: { requirement_types_folders: [folder] },
  };
}

// =============================================================================
// Data type definitions
// =============================================================================

/**
 * Actions for data type definitions below an existing types folder
 *
 * The first action (on the types folder) creates missing and deletes
 * obsolete definitions; the rest extend or trim the literals of existing
 * definitions. Void actions are left for the caller to prune.
 */
export function dataTypeActions(ctx: ReconcileContext, folder: LiveTypesFolder): ChangeAction[] {
  const base: ChangeAction = { parent: uuidRef(folder.uuid) };
  const modifications: ChangeAction[] = [];

  for (const [name, values] of ctx.snapshot.dataTypes) {
    const dtdef = ctx.graph.dataTypeDefinitionByName(name, folder);
    if (dtdef === undefined) {
      addExtension(base, 'data_type_definitions', dataTypeCreatePayload(name, values));
      continue;
    }

    const action: ChangeAction = { parent: uuidRef(dtdef.uuid) };
    const liveNames = new Set(dtdef.values.map((value) => value.longName));
    const wanted = new Set(values);
    for (const value of values) {
      if (!liveNames.has(value)) {
        addExtension(action, 'values', enumValuePayload(name, value));
      }
    }
    for (const value of dtdef.values) {
      if (!wanted.has(value.longName)) {
        addDeletion(action, 'values', uuidRef(value.uuid));
      }
    }
    if (!isVoidAction(action)) {
      modifications.push(action);
    }
  }

  for (const dtdef of folder.dataTypeDefinitions) {
    if (!ctx.snapshot.dataTypes.has(dtdef.longName)) {
      addDeletion(base, 'data_type_definitions', uuidRef(dtdef.uuid));
    }
  }

  return [base, ...modifications];
}

// =============================================================================
// Requirement types
// =============================================================================

/**
 * Modifications of an existing Enum attribute definition, if any
 */
function enumDefinitionModifications(
  ctx: ReconcileContext,
  adef: LiveEnumAttributeDefinition,
  name: string,
  spec: AttributeDefinitionSpec
): Modifications | undefined {
  const mods: Modifications = {};
  if (adef.dataType?.longName !== name) {
    const dataType = dataTypeReference(ctx, name);
    if (dataType !== undefined) {
      mods.data_type = dataType;
    }
  }
  if (adef.multiValued !== spec.multiValued) {
    mods.multi_valued = spec.multiValued;
  }
  return Object.keys(mods).length > 0 ? mods : undefined;
}

/**
 * Actions for one existing requirement type and its attribute definitions
 */
function requirementTypeModActions(
  ctx: ReconcileContext,
  reqtype: LiveRequirementType,
  spec: RequirementTypeSpec
): ChangeAction[] {
  const action: ChangeAction = { parent: uuidRef(reqtype.uuid) };
  const definitionMods: ChangeAction[] = [];

  if (reqtype.longName !== spec.longName) {
    action.modify = { long_name: spec.longName };
  }

  for (const [name, adefSpec] of spec.attributes) {
    const adef = reqtype.attributeDefinitions.find((candidate) => candidate.longName === name);
    const create = (): void =>
      addExtension(
        action,
        'attribute_definitions',
        attributeDefinitionCreatePayload(ctx, name, adefSpec, reqtype.identifier)
      );

    if (adef === undefined) {
      create();
      continue;
    }
    if (adef.class !== attributeDefinitionClass(adefSpec.kind)) {
      // The definition class cannot change in place
      addDeletion(action, 'attribute_definitions', uuidRef(adef.uuid));
      create();
      continue;
    }
    if (adef.class === 'AttributeDefinitionEnumeration') {
      const mods = enumDefinitionModifications(ctx, adef, name, adefSpec);
      if (mods !== undefined) {
        definitionMods.push({ parent: uuidRef(adef.uuid), modify: mods });
      }
    }
  }

  for (const adef of reqtype.attributeDefinitions) {
    if (!spec.attributes.has(adef.longName)) {
      addDeletion(action, 'attribute_definitions', uuidRef(adef.uuid));
    }
  }

  return [action, ...definitionMods];
}

/**
 * Actions for requirement types below an existing types folder
 *
 * The first action (on the types folder) creates missing and deletes
 * obsolete requirement types; the rest modify existing ones.
 */
export function requirementTypeActions(
  ctx: ReconcileContext,
  folder: LiveTypesFolder
): ChangeAction[] {
  const base: ChangeAction = { parent: uuidRef(folder.uuid) };
  const modifications: ChangeAction[] = [];

  for (const [identifier, spec] of ctx.snapshot.requirementTypes) {
    const reqtype = ctx.graph.requirementTypeByIdentifier(identifier, folder);
    if (reqtype === undefined) {
      addExtension(base, 'requirement_types', requirementTypeCreatePayload(ctx, identifier, spec));
    } else {
      modifications.push(...requirementTypeModActions(ctx, reqtype, spec));
    }
  }

  for (const reqtype of folder.requirementTypes) {
    if (!ctx.snapshot.requirementTypes.has(reqtype.identifier)) {
      addDeletion(base, 'requirement_types', uuidRef(reqtype.uuid));
    }
  }

  return [base, ...modifications];
}
