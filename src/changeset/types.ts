/**
 * Types for change set calculation
 *
 * Covers the three sides of a sync run:
 * - the tracker snapshot (desired state, after ingestion),
 * - references into the live graph or to entities promised in the same batch,
 * - the declarative change actions handed to the applier.
 */

import type { AttributeKind, ScalarValue } from '../model/types.js';

export type { AttributeKind, ScalarValue } from '../model/types.js';

// =============================================================================
// References
// =============================================================================

/**
 * Points at an element that exists in the live graph
 */
export interface UuidReference {
  readonly kind: 'uuid';
  readonly uuid: string;
}

/**
 * Forward reference to an element created elsewhere in the same batch.
 * The applier resolves it against the creation payload whose `promise_id`
 * equals `label`.
 */
export interface PromiseReference {
  readonly kind: 'promise';
  readonly label: string;
}

export type Reference = UuidReference | PromiseReference;

// =============================================================================
// Change actions
// =============================================================================

/**
 * Value of a field inside a creation payload
 */
export type PayloadValue =
  | ScalarValue
  | null
  | Reference
  | CreatePayload
  | readonly PayloadValue[];

/**
 * Description of an element to create. Nested lists create children.
 */
export interface CreatePayload {
  [field: string]: PayloadValue;
}

/**
 * New value of an attribute inside `modify.attributes`
 */
export type AttributeModification = ScalarValue | null | readonly Reference[];

/**
 * Field modifications of an existing element
 */
export interface Modifications {
  long_name?: string;
  text?: string;
  type?: Reference | null;
  data_type?: Reference;
  multi_valued?: boolean;
  attributes?: Record<string, AttributeModification>;
}

/**
 * Entry of an `extend` slot: a new element or an existing one moved here
 */
export type ExtendEntry = CreatePayload | Reference;

/**
 * A single declarative change on the element referenced by `parent`
 */
export interface ChangeAction {
  parent: Reference;
  extend?: Record<string, ExtendEntry[]>;
  modify?: Modifications;
  delete?: Record<string, Reference[]>;
}

/**
 * Partial change merged into an action
 */
export type ActionFragment = Omit<ChangeAction, 'parent'>;

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Raw attribute value as exported by the tracker
 */
export type RawAttributeValue = ScalarValue | readonly ScalarValue[] | null;

/**
 * Attribute definition declared by a requirement type in the snapshot
 */
export interface AttributeDefinitionSpec {
  kind: AttributeKind;
  /** Only meaningful for Enum definitions */
  multiValued: boolean;
}

/**
 * Requirement type declared in the snapshot
 */
export interface RequirementTypeSpec {
  longName: string;
  /** Attribute definitions keyed by attribute name, in snapshot order */
  attributes: ReadonlyMap<string, AttributeDefinitionSpec>;
}

interface WorkItemSpecBase {
  /** External identifier, stable across runs and unique within the module */
  id: string;
  longName: string;
  text?: string;
  /** Identifier of the requirement type */
  type?: string;
  /** Attribute values keyed by attribute name, in snapshot order */
  attributes: ReadonlyMap<string, RawAttributeValue>;
}

export interface RequirementSpec extends WorkItemSpecBase {
  kind: 'requirement';
}

export interface FolderSpec extends WorkItemSpecBase {
  kind: 'folder';
  children: readonly WorkItemSpec[];
}

/**
 * Snapshot work item. Folder-ness is decided once, at ingestion.
 */
export type WorkItemSpec = RequirementSpec | FolderSpec;

/**
 * Desired state of one requirements module
 */
export interface TrackerSnapshot {
  /** Module identifier in the tracker */
  id: string;
  /** Enumeration options keyed by data type definition name */
  dataTypes: ReadonlyMap<string, readonly string[]>;
  /** Requirement types keyed by identifier */
  requirementTypes: ReadonlyMap<string, RequirementTypeSpec>;
  items: readonly WorkItemSpec[];
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration of one synchronized module
 */
export interface TrackerConfig {
  /** Persistent identity of the target module in the live graph (required) */
  uuid?: string;
  /** Tracker-side identifier used to pair the module with its snapshot */
  externalId?: string;
}

/**
 * Whole configuration file
 */
export interface SyncConfig {
  model?: {
    path: string;
  };
  modules: TrackerConfig[];
}
