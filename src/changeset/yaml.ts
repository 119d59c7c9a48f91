/**
 * YAML form of a change set
 *
 * References are written as tagged scalars so the applier can tell them
 * apart from plain strings:
 *
 * ```yaml
 * - parent: !uuid 5d9c1f0e-...
 *   modify:
 *     type: !promise RequirementType req
 * ```
 */

import { Scalar, parse, stringify, type ScalarTag } from 'yaml';
import { stringifyString } from 'yaml/util';
import type {
  AttributeModification,
  ChangeAction,
  CreatePayload,
  ExtendEntry,
  Modifications,
  PayloadValue,
  Reference,
} from './types.js';
import { isReference, promiseRef, uuidRef } from './references.js';
import { LoadError, isRecord } from '../utils/load.js';

const CODE = 'INVALID_CHANGESET';

function referenceTag(kind: Reference['kind'], create: (text: string) => Reference): ScalarTag {
  return {
    tag: `!${kind}`,
    identify: (value) => isReference(value) && value.kind === kind,
    resolve: (text) => create(text),
    stringify: (item, ctx, onComment, onChompKeep) => {
      const value = item.value;
      if (!isReference(value)) {
        return String(value);
      }
      const text = new Scalar(value.kind === 'uuid' ? value.uuid : value.label);
      return stringifyString(text, ctx, onComment, onChompKeep);
    },
  };
}

const CUSTOM_TAGS = [
  'timestamp' as const,
  referenceTag('uuid', uuidRef),
  referenceTag('promise', promiseRef),
];

// =============================================================================
// Dump
// =============================================================================

/**
 * Serialize an action list to YAML
 */
export function dumpChangeSet(actions: readonly ChangeAction[]): string {
  if (actions.length === 0) {
    return '[]\n';
  }
  return stringify(actions, { customTags: CUSTOM_TAGS, aliasDuplicateObjects: false });
}

// =============================================================================
// Load
// =============================================================================

function invalid(message: string, path: string): LoadError {
  return new LoadError(`${message} at ${path}`, CODE, { path });
}

function isScalar(value: unknown): value is string | number | boolean | Date {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

function parseReference(value: unknown, path: string): Reference {
  if (!isReference(value)) {
    throw invalid('Expected a !uuid or !promise reference', path);
  }
  return value;
}

function parsePayloadValue(value: unknown, path: string): PayloadValue {
  if (value === null || isScalar(value) || isReference(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry, i) => parsePayloadValue(entry, `${path}[${i}]`));
  }
  if (isRecord(value)) {
    return parsePayload(value, path);
  }
  throw invalid('Unsupported payload value', path);
}

function parsePayload(record: Record<string, unknown>, path: string): CreatePayload {
  const payload: CreatePayload = {};
  for (const [field, value] of Object.entries(record)) {
    payload[field] = parsePayloadValue(value, `${path}.${field}`);
  }
  return payload;
}

function parseSlots<T>(
  value: unknown,
  path: string,
  parseEntry: (entry: unknown, path: string) => T
): Record<string, T[]> {
  if (!isRecord(value)) {
    throw invalid('Expected a mapping of slots', path);
  }
  const slots: Record<string, T[]> = {};
  for (const [slot, entries] of Object.entries(value)) {
    if (!Array.isArray(entries)) {
      throw invalid('Expected a list', `${path}.${slot}`);
    }
    slots[slot] = entries.map((entry, i) => parseEntry(entry, `${path}.${slot}[${i}]`));
  }
  return slots;
}

function parseExtendEntry(entry: unknown, path: string): ExtendEntry {
  if (isReference(entry)) {
    return entry;
  }
  if (isRecord(entry)) {
    return parsePayload(entry, path);
  }
  throw invalid('Expected a creation payload or a reference', path);
}

function parseAttributeModification(value: unknown, path: string): AttributeModification {
  if (value === null || isScalar(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry, i) => parseReference(entry, `${path}[${i}]`));
  }
  throw invalid('Unsupported attribute value', path);
}

function parseModifications(value: unknown, path: string): Modifications {
  if (!isRecord(value)) {
    throw invalid('Expected a mapping of modifications', path);
  }
  const mods: Modifications = {};
  for (const [field, entry] of Object.entries(value)) {
    const at = `${path}.${field}`;
    switch (field) {
      case 'long_name':
      case 'text':
        if (typeof entry !== 'string') {
          throw invalid('Expected a string', at);
        }
        mods[field] = entry;
        break;
      case 'type':
        mods.type = entry === null ? null : parseReference(entry, at);
        break;
      case 'data_type':
        mods.data_type = parseReference(entry, at);
        break;
      case 'multi_valued':
        if (typeof entry !== 'boolean') {
          throw invalid('Expected a boolean', at);
        }
        mods.multi_valued = entry;
        break;
      case 'attributes': {
        if (!isRecord(entry)) {
          throw invalid('Expected a mapping of attributes', at);
        }
        const attributes: Record<string, AttributeModification> = {};
        for (const [name, attr] of Object.entries(entry)) {
          attributes[name] = parseAttributeModification(attr, `${at}.${name}`);
        }
        mods.attributes = attributes;
        break;
      }
      default:
        throw invalid(`Unknown field '${field}'`, at);
    }
  }
  return mods;
}

function parseAction(raw: unknown, path: string): ChangeAction {
  if (!isRecord(raw)) {
    throw invalid('Expected an action mapping', path);
  }
  const action: ChangeAction = { parent: parseReference(raw.parent, `${path}.parent`) };
  if (raw.extend !== undefined) {
    action.extend = parseSlots(raw.extend, `${path}.extend`, parseExtendEntry);
  }
  if (raw.modify !== undefined) {
    action.modify = parseModifications(raw.modify, `${path}.modify`);
  }
  if (raw.delete !== undefined) {
    action.delete = parseSlots(raw.delete, `${path}.delete`, parseReference);
  }
  return action;
}

/**
 * Parse a change set written by `dumpChangeSet`
 *
 * @throws LoadError with code INVALID_CHANGESET on malformed input
 */
export function loadChangeSet(text: string): ChangeAction[] {
  let raw: unknown;
  try {
    raw = parse(text, { customTags: CUSTOM_TAGS });
  } catch (err) {
    throw new LoadError(
      `Failed to parse YAML: ${err instanceof Error ? err.message : String(err)}`,
      'PARSE_ERROR',
      { originalError: err }
    );
  }
  if (raw === null || raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw invalid('Expected a list of actions', 'changeset');
  }
  return raw.map((action, i) => parseAction(action, `changeset[${i}]`));
}
