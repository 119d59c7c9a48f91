/**
 * Attribute value validation
 *
 * Checks a raw snapshot value against the kind its requirement type
 * declares and yields the storage key and the validated value.
 */

import type {
  AttributeKind,
  RawAttributeValue,
  RequirementTypeSpec,
  ScalarValue,
  TrackerSnapshot,
} from './types.js';
import { InvalidFieldValueError } from './errors.js';

/**
 * Validated attribute value of a scalar kind
 */
export interface ScalarAttributeValue {
  kind: Exclude<AttributeKind, 'Enum'>;
  key: 'value';
  value: ScalarValue;
}

/**
 * Validated attribute value of an Enum kind
 */
export interface EnumAttributeValue {
  kind: 'Enum';
  key: 'values';
  /** Names of the selected literals */
  value: readonly string[];
}

export type ValidatedAttributeValue = ScalarAttributeValue | EnumAttributeValue;

/**
 * Expected runtime shape per attribute kind
 */
const SHAPE_CHECKS: Record<Exclude<AttributeKind, 'Enum'>, (value: unknown) => value is ScalarValue> = {
  String: (value): value is string => typeof value === 'string',
  Date: (value): value is Date => value instanceof Date && !Number.isNaN(value.getTime()),
  Integer: (value): value is number => typeof value === 'number' && Number.isInteger(value),
  Float: (value): value is number => typeof value === 'number' && Number.isFinite(value),
  Boolean: (value): value is boolean => typeof value === 'boolean',
};

function isStringList(value: RawAttributeValue): value is readonly string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

/**
 * Validate `value` of attribute `name` against the requirement type
 *
 * Enum values must be a list of literal names of which at least one is a
 * declared option of the data type definition named like the attribute.
 * Only the declared literals are kept in the validated value.
 *
 * @throws InvalidFieldValueError on a shape or membership mismatch, or if
 *   the requirement type does not declare `name`
 */
export function validateAttributeValue(
  name: string,
  value: RawAttributeValue,
  reqType: RequirementTypeSpec,
  dataTypes: TrackerSnapshot['dataTypes']
): ValidatedAttributeValue {
  const definition = reqType.attributes.get(name);
  if (definition === undefined) {
    throw new InvalidFieldValueError(name, value, 'value');
  }

  if (definition.kind === 'Enum') {
    const options = new Set(dataTypes.get(name) ?? []);
    const declared = isStringList(value) ? [...new Set(value)].filter((literal) => options.has(literal)) : [];
    if (declared.length === 0) {
      throw new InvalidFieldValueError(name, value, 'values');
    }
    return { kind: 'Enum', key: 'values', value: declared };
  }

  const kind = definition.kind;
  if (!SHAPE_CHECKS[kind](value)) {
    throw new InvalidFieldValueError(name, value, 'value');
  }
  return { kind, key: 'value', value };
}

// =============================================================================
// Reserved attributes
// =============================================================================

/**
 * Attribute name/value pairs that are never stored as attribute values.
 * `Type: Folder` only marks a snapshot item as a folder.
 */
const RESERVED_ATTRIBUTES: ReadonlyMap<string, ReadonlySet<string>> = new Map([
  ['Type', new Set(['Folder'])],
]);

/**
 * Whether `name: value` is a reserved pair (for a list: every entry is)
 */
export function isReservedAttribute(name: string, value: RawAttributeValue): boolean {
  const reserved = RESERVED_ATTRIBUTES.get(name);
  if (reserved === undefined || value === null) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0 && value.every((entry) => typeof entry === 'string' && reserved.has(entry));
  }
  return typeof value === 'string' && reserved.has(value);
}

/**
 * Whether the attributes of a snapshot item mark it as a folder
 */
export function hasFolderMarker(attributes: ReadonlyMap<string, RawAttributeValue>): boolean {
  for (const [name, value] of attributes) {
    if (isReservedAttribute(name, value)) {
      return true;
    }
  }
  return false;
}
