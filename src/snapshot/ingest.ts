/**
 * Tracker snapshot ingestion
 *
 * Turns the raw YAML export of a tracker into a `TrackerSnapshot`.
 * Folder-ness of work items is decided here, once: an item is a folder
 * when it has children or carries the `Type: Folder` marker.
 *
 * @example
 * ```yaml
 * - id: project/space
 *   data_types:
 *     Status: [Open, Closed]
 *   requirement_types:
 *     req:
 *       long_name: Requirement
 *       attributes:
 *         Status: { type: Enum, multi_values: true }
 *         Submitted at: { type: Date }
 *   items:
 *     - id: "1"
 *       long_name: Functional requirements
 *       children:
 *         - id: "2"
 *           long_name: Login
 *           type: req
 *           attributes:
 *             Status: [Open]
 * ```
 */

import type {
  AttributeDefinitionSpec,
  RawAttributeValue,
  RequirementTypeSpec,
  ScalarValue,
  TrackerSnapshot,
  WorkItemSpec,
} from '../changeset/types.js';
import { ATTRIBUTE_KINDS, type AttributeKind } from '../model/types.js';
import { hasFolderMarker } from '../changeset/validate.js';
import {
  LoadError,
  isRecord,
  optionalList,
  optionalRecord,
  optionalString,
  readYamlFile,
  requireString,
} from '../utils/load.js';

const CODE = 'INVALID_SNAPSHOT';

function isAttributeKind(value: unknown): value is AttributeKind {
  return ATTRIBUTE_KINDS.some((kind) => kind === value);
}

function isScalar(value: unknown): value is ScalarValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new LoadError(`Expected a mapping at ${path}`, CODE, { path });
  }
  return value;
}

function parseRawValue(value: unknown, path: string): RawAttributeValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (isScalar(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    const entries: ScalarValue[] = [];
    for (const entry of value) {
      if (!isScalar(entry)) {
        throw new LoadError(`Expected scalar list entries at ${path}`, CODE, { path });
      }
      entries.push(entry);
    }
    return entries;
  }
  throw new LoadError(`Unsupported attribute value at ${path}`, CODE, { path });
}

function parseAttributeDefinition(raw: unknown, path: string): AttributeDefinitionSpec {
  const record = expectRecord(raw, path);
  const kind = record.type;
  if (!isAttributeKind(kind)) {
    throw new LoadError(`Unknown attribute type at ${path}: ${String(kind)}`, CODE, {
      path,
      type: kind,
      expected: ATTRIBUTE_KINDS,
    });
  }
  return {
    kind,
    multiValued: kind === 'Enum' && record.multi_values === true,
  };
}

function parseRequirementType(raw: unknown, path: string): RequirementTypeSpec {
  const record = expectRecord(raw, path);
  const attributes = new Map<string, AttributeDefinitionSpec>();
  for (const [name, adef] of Object.entries(optionalRecord(record, 'attributes', path, CODE))) {
    attributes.set(name, parseAttributeDefinition(adef, `${path}.attributes.${name}`));
  }
  return {
    longName: requireString(record, 'long_name', path, CODE),
    attributes,
  };
}

function parseWorkItem(raw: unknown, path: string): WorkItemSpec {
  const record = expectRecord(raw, path);
  const attributes = new Map<string, RawAttributeValue>();
  for (const [name, value] of Object.entries(optionalRecord(record, 'attributes', path, CODE))) {
    attributes.set(name, parseRawValue(value, `${path}.attributes.${name}`));
  }

  const base = {
    id: requireString(record, 'id', path, CODE),
    longName: requireString(record, 'long_name', path, CODE),
    text: optionalString(record, 'text', path, CODE),
    type: optionalString(record, 'type', path, CODE),
    attributes,
  };

  const children = optionalList(record, 'children', path, CODE).map((child, i) =>
    parseWorkItem(child, `${path}.children[${i}]`)
  );
  if (children.length > 0 || hasFolderMarker(attributes)) {
    return { ...base, kind: 'folder', children };
  }
  return { ...base, kind: 'requirement' };
}

/**
 * Validate and normalize one raw tracker snapshot
 *
 * @throws LoadError with code INVALID_SNAPSHOT on malformed input
 */
export function ingestSnapshot(raw: unknown, path = 'snapshot'): TrackerSnapshot {
  const record = expectRecord(raw, path);

  const dataTypes = new Map<string, readonly string[]>();
  for (const [name, values] of Object.entries(optionalRecord(record, 'data_types', path, CODE))) {
    if (!Array.isArray(values)) {
      throw new LoadError(`Expected a list of options at ${path}.data_types.${name}`, CODE, {
        path,
        name,
      });
    }
    dataTypes.set(name, [...new Set(values.map((value) => String(value)))]);
  }

  const requirementTypes = new Map<string, RequirementTypeSpec>();
  for (const [id, reqtype] of Object.entries(
    optionalRecord(record, 'requirement_types', path, CODE)
  )) {
    requirementTypes.set(id, parseRequirementType(reqtype, `${path}.requirement_types.${id}`));
  }

  return {
    id: requireString(record, 'id', path, CODE),
    dataTypes,
    requirementTypes,
    items: optionalList(record, 'items', path, CODE).map((item, i) =>
      parseWorkItem(item, `${path}.items[${i}]`)
    ),
  };
}

/**
 * Ingest a list of raw snapshots (one per module)
 */
export function ingestSnapshots(raw: unknown): TrackerSnapshot[] {
  if (!Array.isArray(raw)) {
    return [ingestSnapshot(raw)];
  }
  return raw.map((snapshot, i) => ingestSnapshot(snapshot, `snapshots[${i}]`));
}

/**
 * Load tracker snapshots from a YAML file
 *
 * Timestamps in the file are read as dates so Date attributes validate.
 */
export async function loadSnapshots(filePath: string): Promise<TrackerSnapshot[]> {
  const raw = await readYamlFile(filePath, { customTags: ['timestamp'] });
  return ingestSnapshots(raw);
}
