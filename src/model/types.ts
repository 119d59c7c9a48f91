/**
 * Types for the live requirements model
 *
 * The live graph is the last-synchronized state of a requirements module.
 * Everything here is read-only for the change set calculation; the applier
 * that mutates the persisted model lives outside of this package.
 */

// =============================================================================
// Attribute kinds
// =============================================================================

/**
 * Kinds an attribute definition can declare in a tracker snapshot
 */
export type AttributeKind = 'String' | 'Enum' | 'Date' | 'Integer' | 'Float' | 'Boolean';

/**
 * All attribute kinds, in declaration order
 */
export const ATTRIBUTE_KINDS: readonly AttributeKind[] = [
  'String',
  'Enum',
  'Date',
  'Integer',
  'Float',
  'Boolean',
];

/**
 * Scalar value stored on a non-enumeration attribute value
 */
export type ScalarValue = string | number | boolean | Date;

// =============================================================================
// Type system
// =============================================================================

/**
 * Any element with a persistent identity
 */
export interface LiveElement {
  readonly uuid: string;
}

/**
 * A literal of an enumeration data type definition
 */
export interface LiveEnumValue extends LiveElement {
  readonly longName: string;
}

/**
 * Enumeration data type definition with its literals
 */
export interface LiveDataTypeDefinition extends LiveElement {
  readonly longName: string;
  readonly values: readonly LiveEnumValue[];
}

/**
 * Plain attribute definition. The scalar kind is carried by the values,
 * not by the definition.
 */
export interface LivePlainAttributeDefinition extends LiveElement {
  readonly class: 'AttributeDefinition';
  readonly identifier: string;
  readonly longName: string;
}

/**
 * Enumeration attribute definition
 */
export interface LiveEnumAttributeDefinition extends LiveElement {
  readonly class: 'AttributeDefinitionEnumeration';
  readonly identifier: string;
  readonly longName: string;
  readonly dataType?: LiveDataTypeDefinition;
  readonly multiValued: boolean;
}

export type LiveAttributeDefinition = LivePlainAttributeDefinition | LiveEnumAttributeDefinition;

/**
 * Class names of attribute definitions
 */
export type AttributeDefinitionClass = LiveAttributeDefinition['class'];

/**
 * Requirement type with its attribute definitions
 */
export interface LiveRequirementType extends LiveElement {
  readonly identifier: string;
  readonly longName: string;
  readonly attributeDefinitions: readonly LiveAttributeDefinition[];
}

/**
 * Folder holding the type system of a module
 */
export interface LiveTypesFolder extends LiveElement {
  readonly identifier: string;
  readonly longName: string;
  readonly dataTypeDefinitions: readonly LiveDataTypeDefinition[];
  readonly requirementTypes: readonly LiveRequirementType[];
}

// =============================================================================
// Attribute values
// =============================================================================

export interface LiveScalarAttributeValue extends LiveElement {
  readonly kind: Exclude<AttributeKind, 'Enum'>;
  readonly definition?: LiveAttributeDefinition;
  readonly value: ScalarValue | null;
}

export interface LiveEnumAttributeValue extends LiveElement {
  readonly kind: 'Enum';
  readonly definition?: LiveAttributeDefinition;
  readonly values: readonly LiveEnumValue[];
}

export type LiveAttributeValue = LiveScalarAttributeValue | LiveEnumAttributeValue;

// =============================================================================
// Work items
// =============================================================================

interface LiveWorkItemBase extends LiveElement {
  readonly identifier: string;
  readonly longName: string;
  readonly text?: string;
  readonly type?: LiveRequirementType;
  readonly attributes: readonly LiveAttributeValue[];
  readonly parent: LiveContainer;
}

export interface LiveRequirement extends LiveWorkItemBase {
  readonly kind: 'requirement';
}

export interface LiveFolder extends LiveWorkItemBase {
  readonly kind: 'folder';
  readonly folders: readonly LiveFolder[];
  readonly requirements: readonly LiveRequirement[];
}

export type LiveWorkItem = LiveRequirement | LiveFolder;

/**
 * Root container of a tracker's requirements
 */
export interface LiveModule extends LiveElement {
  readonly kind: 'module';
  readonly identifier: string;
  readonly longName: string;
  readonly folders: readonly LiveFolder[];
  readonly requirements: readonly LiveRequirement[];
  readonly typesFolders: readonly LiveTypesFolder[];
}

/**
 * Anything that can own folders and requirements
 */
export type LiveContainer = LiveModule | LiveFolder;

// =============================================================================
// Lookup interface
// =============================================================================

/**
 * Read-only lookups into the live graph used by the change set calculation
 */
export interface LiveGraph {
  /** Find a requirements module by its persistent identity */
  moduleByUuid(uuid: string): LiveModule | undefined;

  /** Find a requirements module by its external identifier */
  moduleByIdentifier(identifier: string): LiveModule | undefined;

  /** Find a folder or requirement anywhere below `module` */
  workItemByIdentifier(module: LiveModule, identifier: string): LiveWorkItem | undefined;

  /** Find the types folder of `module` */
  typesFolder(module: LiveModule): LiveTypesFolder | undefined;

  /** Find a data type definition by name below a types folder */
  dataTypeDefinitionByName(
    name: string,
    below: LiveTypesFolder | undefined
  ): LiveDataTypeDefinition | undefined;

  /** Find an enum literal by name below the named data type definition */
  enumValueByName(
    dataTypeName: string,
    name: string,
    below: LiveTypesFolder | undefined
  ): LiveEnumValue | undefined;

  /** Find a requirement type by identifier below a types folder */
  requirementTypeByIdentifier(
    identifier: string,
    below: LiveTypesFolder | undefined
  ): LiveRequirementType | undefined;

  /** Find an attribute definition of the given class by identifier below a types folder */
  attributeDefinitionByIdentifier(
    cls: AttributeDefinitionClass,
    identifier: string,
    below: LiveTypesFolder | undefined
  ): LiveAttributeDefinition | undefined;
}
