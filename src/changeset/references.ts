/**
 * Reference resolution
 *
 * Every lookup yields either a uuid reference to the live element or a
 * promise whose label is the one the creation payload for that element
 * declares. Both sides derive labels from the helpers below, so they
 * agree without coordination.
 */

import type { AttributeDefinitionClass, LiveGraph, LiveTypesFolder } from '../model/types.js';
import type { PromiseReference, Reference, UuidReference } from './types.js';

// =============================================================================
// Constructors and guards
// =============================================================================

export function uuidRef(uuid: string): UuidReference {
  return { kind: 'uuid', uuid };
}

export function promiseRef(label: string): PromiseReference {
  return { kind: 'promise', label };
}

/**
 * Check whether an arbitrary value is a reference
 */
export function isReference(value: unknown): value is Reference {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  if (!('kind' in value)) {
    return false;
  }
  if (value.kind === 'uuid') {
    return 'uuid' in value && typeof value.uuid === 'string';
  }
  if (value.kind === 'promise') {
    return 'label' in value && typeof value.label === 'string';
  }
  return false;
}

export function sameReference(a: Reference, b: Reference): boolean {
  if (a.kind === 'uuid') {
    return b.kind === 'uuid' && a.uuid === b.uuid;
  }
  return b.kind === 'promise' && a.label === b.label;
}

export function formatReference(ref: Reference): string {
  return ref.kind === 'uuid' ? `!uuid ${ref.uuid}` : `!promise ${ref.label}`;
}

// =============================================================================
// Promise labels
// =============================================================================

export const DATA_TYPE_DEFINITION_CLASS = 'EnumerationDataTypeDefinition';

export function dataTypeLabel(name: string): string {
  return `${DATA_TYPE_DEFINITION_CLASS} ${name}`;
}

export function enumValueLabel(dataTypeName: string, value: string): string {
  return `EnumValue ${dataTypeName} ${value}`;
}

export function requirementTypeLabel(identifier: string): string {
  return `RequirementType ${identifier}`;
}

/**
 * Identifier of the attribute definition `name` of a requirement type
 */
export function attributeDefinitionIdentifier(name: string, reqTypeId: string): string {
  return `${name} ${reqTypeId}`;
}

export function attributeDefinitionLabel(
  cls: AttributeDefinitionClass,
  name: string,
  reqTypeId: string
): string {
  return `${cls} ${attributeDefinitionIdentifier(name, reqTypeId)}`;
}

// =============================================================================
// Resolver
// =============================================================================

/**
 * Name-scoped lookups against the live graph of one module
 */
export class ReferenceResolver {
  constructor(
    private readonly graph: LiveGraph,
    private readonly typesFolder: LiveTypesFolder | undefined
  ) {}

  dataType(name: string): Reference {
    const found = this.graph.dataTypeDefinitionByName(name, this.typesFolder);
    return found ? uuidRef(found.uuid) : promiseRef(dataTypeLabel(name));
  }

  enumValue(dataTypeName: string, value: string): Reference {
    const found = this.graph.enumValueByName(dataTypeName, value, this.typesFolder);
    return found ? uuidRef(found.uuid) : promiseRef(enumValueLabel(dataTypeName, value));
  }

  requirementType(identifier: string): Reference {
    const found = this.graph.requirementTypeByIdentifier(identifier, this.typesFolder);
    return found ? uuidRef(found.uuid) : promiseRef(requirementTypeLabel(identifier));
  }

  attributeDefinition(cls: AttributeDefinitionClass, name: string, reqTypeId: string): Reference {
    const found = this.graph.attributeDefinitionByIdentifier(
      cls,
      attributeDefinitionIdentifier(name, reqTypeId),
      this.typesFolder
    );
    return found ? uuidRef(found.uuid) : promiseRef(attributeDefinitionLabel(cls, name, reqTypeId));
  }
}
