/**
 * Plain-data form of the live requirements model
 *
 * A model dump is how the CLI and the tests hand a live graph to the
 * change set calculation. References between elements are written as
 * uuids and resolved when the dump is turned into a `MemoryModel`.
 *
 * @example
 * ```yaml
 * modules:
 *   - uuid: 3be8d0fc-c693-4b9b-8fa1-d59a9eec6ea4
 *     identifier: project/space
 *     long_name: Requirements
 *     types_folders:
 *       - uuid: 67bba9a4-...
 *         identifier: "-2"
 *         long_name: Types
 *         data_type_definitions:
 *           - uuid: 686e198b-...
 *             long_name: Status
 *             values:
 *               - { uuid: 79a9e5e0-..., long_name: Open }
 *         requirement_types: []
 *     folders: []
 *     requirements: []
 * ```
 */

import type { AttributeDefinitionClass, AttributeKind, ScalarValue } from './types.js';
import { ATTRIBUTE_KINDS } from './types.js';
import {
  LoadError,
  isRecord,
  requireString,
  optionalString,
  optionalList,
  readYamlFile,
} from '../utils/load.js';

// =============================================================================
// Dump types
// =============================================================================

export interface EnumValueDump {
  uuid: string;
  long_name: string;
}

export interface DataTypeDefinitionDump {
  uuid: string;
  long_name: string;
  values: EnumValueDump[];
}

export interface AttributeDefinitionDump {
  uuid: string;
  _type: AttributeDefinitionClass;
  identifier: string;
  long_name: string;
  /** uuid of the data type definition (enumeration definitions only) */
  data_type?: string;
  multi_valued?: boolean;
}

export interface RequirementTypeDump {
  uuid: string;
  identifier: string;
  long_name: string;
  attribute_definitions: AttributeDefinitionDump[];
}

export interface TypesFolderDump {
  uuid: string;
  identifier: string;
  long_name: string;
  data_type_definitions: DataTypeDefinitionDump[];
  requirement_types: RequirementTypeDump[];
}

export interface AttributeValueDump {
  uuid: string;
  /** Lowercased attribute kind, e.g. `string` or `enum` */
  _type: Lowercase<AttributeKind>;
  /** uuid of the attribute definition */
  definition?: string;
  value?: ScalarValue | null;
  /** uuids of enum literals (enum values only) */
  values?: string[];
}

export interface RequirementDump {
  uuid: string;
  identifier: string;
  long_name: string;
  text?: string;
  /** uuid of the requirement type */
  type?: string;
  attributes: AttributeValueDump[];
}

export interface FolderDump extends RequirementDump {
  folders: FolderDump[];
  requirements: RequirementDump[];
}

export interface ModuleDump {
  uuid: string;
  identifier: string;
  long_name: string;
  types_folders: TypesFolderDump[];
  folders: FolderDump[];
  requirements: RequirementDump[];
}

export interface ModelDump {
  modules: ModuleDump[];
}

// =============================================================================
// Parsing
// =============================================================================

const CODE = 'INVALID_MODEL';

/**
 * Lowercased `_type` tag of attribute values of `kind`
 */
export function attributeValueType(kind: AttributeKind): Lowercase<AttributeKind> {
  switch (kind) {
    case 'String':
      return 'string';
    case 'Enum':
      return 'enum';
    case 'Date':
      return 'date';
    case 'Integer':
      return 'integer';
    case 'Float':
      return 'float';
    case 'Boolean':
      return 'boolean';
  }
}

const VALUE_TYPES = new Map<string, Lowercase<AttributeKind>>(
  ATTRIBUTE_KINDS.map((kind) => [kind.toLowerCase(), attributeValueType(kind)])
);

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new LoadError(`Expected a mapping at ${path}`, CODE, { path });
  }
  return value;
}

function parseEnumValue(raw: unknown, path: string): EnumValueDump {
  const record = expectRecord(raw, path);
  return {
    uuid: requireString(record, 'uuid', path, CODE),
    long_name: requireString(record, 'long_name', path, CODE),
  };
}

function parseDataTypeDefinition(raw: unknown, path: string): DataTypeDefinitionDump {
  const record = expectRecord(raw, path);
  return {
    uuid: requireString(record, 'uuid', path, CODE),
    long_name: requireString(record, 'long_name', path, CODE),
    values: optionalList(record, 'values', path, CODE).map((value, i) =>
      parseEnumValue(value, `${path}.values[${i}]`)
    ),
  };
}

function parseAttributeDefinition(raw: unknown, path: string): AttributeDefinitionDump {
  const record = expectRecord(raw, path);
  const cls = record._type ?? 'AttributeDefinition';
  if (cls !== 'AttributeDefinition' && cls !== 'AttributeDefinitionEnumeration') {
    throw new LoadError(`Unknown attribute definition class at ${path}: ${String(cls)}`, CODE, {
      path,
      class: cls,
    });
  }

  const dump: AttributeDefinitionDump = {
    uuid: requireString(record, 'uuid', path, CODE),
    _type: cls,
    identifier: requireString(record, 'identifier', path, CODE),
    long_name: requireString(record, 'long_name', path, CODE),
  };
  if (cls === 'AttributeDefinitionEnumeration') {
    dump.data_type = optionalString(record, 'data_type', path, CODE);
    dump.multi_valued = record.multi_valued === true;
  }
  return dump;
}

function parseRequirementType(raw: unknown, path: string): RequirementTypeDump {
  const record = expectRecord(raw, path);
  return {
    uuid: requireString(record, 'uuid', path, CODE),
    identifier: requireString(record, 'identifier', path, CODE),
    long_name: requireString(record, 'long_name', path, CODE),
    attribute_definitions: optionalList(record, 'attribute_definitions', path, CODE).map(
      (adef, i) => parseAttributeDefinition(adef, `${path}.attribute_definitions[${i}]`)
    ),
  };
}

function parseTypesFolder(raw: unknown, path: string): TypesFolderDump {
  const record = expectRecord(raw, path);
  return {
    uuid: requireString(record, 'uuid', path, CODE),
    identifier: requireString(record, 'identifier', path, CODE),
    long_name: requireString(record, 'long_name', path, CODE),
    data_type_definitions: optionalList(record, 'data_type_definitions', path, CODE).map(
      (dtdef, i) => parseDataTypeDefinition(dtdef, `${path}.data_type_definitions[${i}]`)
    ),
    requirement_types: optionalList(record, 'requirement_types', path, CODE).map((reqtype, i) =>
      parseRequirementType(reqtype, `${path}.requirement_types[${i}]`)
    ),
  };
}

function parseScalar(value: unknown, path: string): ScalarValue | null {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value ?? null;
  }
  throw new LoadError(`Expected a scalar value at ${path}`, CODE, { path });
}

function parseAttributeValue(raw: unknown, path: string): AttributeValueDump {
  const record = expectRecord(raw, path);
  const valueType = VALUE_TYPES.get(String(record._type).toLowerCase());
  if (valueType === undefined) {
    throw new LoadError(`Unknown attribute value type at ${path}: ${String(record._type)}`, CODE, {
      path,
    });
  }

  const dump: AttributeValueDump = {
    uuid: requireString(record, 'uuid', path, CODE),
    _type: valueType,
    definition: optionalString(record, 'definition', path, CODE),
  };
  if (valueType === 'enum') {
    dump.values = optionalList(record, 'values', path, CODE).map((value) => String(value));
  } else {
    dump.value = parseScalar(record.value, `${path}.value`);
  }
  return dump;
}

function parseRequirement(raw: unknown, path: string): RequirementDump {
  const record = expectRecord(raw, path);
  const dump: RequirementDump = {
    uuid: requireString(record, 'uuid', path, CODE),
    identifier: requireString(record, 'identifier', path, CODE),
    long_name: requireString(record, 'long_name', path, CODE),
    attributes: optionalList(record, 'attributes', path, CODE).map((attr, i) =>
      parseAttributeValue(attr, `${path}.attributes[${i}]`)
    ),
  };
  const text = optionalString(record, 'text', path, CODE);
  if (text !== undefined) {
    dump.text = text;
  }
  const type = optionalString(record, 'type', path, CODE);
  if (type !== undefined) {
    dump.type = type;
  }
  return dump;
}

function parseFolder(raw: unknown, path: string): FolderDump {
  const record = expectRecord(raw, path);
  return {
    ...parseRequirement(record, path),
    folders: optionalList(record, 'folders', path, CODE).map((folder, i) =>
      parseFolder(folder, `${path}.folders[${i}]`)
    ),
    requirements: optionalList(record, 'requirements', path, CODE).map((req, i) =>
      parseRequirement(req, `${path}.requirements[${i}]`)
    ),
  };
}

function parseModule(raw: unknown, path: string): ModuleDump {
  const record = expectRecord(raw, path);
  return {
    uuid: requireString(record, 'uuid', path, CODE),
    identifier: requireString(record, 'identifier', path, CODE),
    long_name: optionalString(record, 'long_name', path, CODE) ?? '',
    types_folders: optionalList(record, 'types_folders', path, CODE).map((folder, i) =>
      parseTypesFolder(folder, `${path}.types_folders[${i}]`)
    ),
    folders: optionalList(record, 'folders', path, CODE).map((folder, i) =>
      parseFolder(folder, `${path}.folders[${i}]`)
    ),
    requirements: optionalList(record, 'requirements', path, CODE).map((req, i) =>
      parseRequirement(req, `${path}.requirements[${i}]`)
    ),
  };
}

/**
 * Validate raw YAML data as a model dump
 *
 * @throws LoadError with code INVALID_MODEL on malformed input
 */
export function parseModelDump(raw: unknown): ModelDump {
  const record = expectRecord(raw, 'model');
  return {
    modules: optionalList(record, 'modules', 'model', CODE).map((mod, i) =>
      parseModule(mod, `modules[${i}]`)
    ),
  };
}

/**
 * Load a model dump from a YAML file
 */
export async function loadModelDump(filePath: string): Promise<ModelDump> {
  const raw = await readYamlFile(filePath, { customTags: ['timestamp'] });
  return parseModelDump(raw);
}
