/**
 * Shared model and snapshot fixtures
 *
 * The baseline model holds one module whose live state matches
 * `createBaselineSnapshot()` exactly:
 *
 *   module mod-1 (project/space)
 *   ├── Types (tf-1): Status [Open, Closed]; req { Status: Enum*, Priority: Integer }
 *   ├── folder f-1 "1" Functional
 *   │   └── requirement r-2 "2" Login { Status: [Open], Priority: 3 }
 *   └── requirement r-3 "3" Logout
 */

import type { ModelDump, ModuleDump } from '../../src/model/dump.js';
import { MemoryModel } from '../../src/model/memory.js';
import { ingestSnapshot } from '../../src/snapshot/ingest.js';
import type { TrackerSnapshot } from '../../src/changeset/types.js';
import type { ReconcileContext } from '../../src/changeset/context.js';
import { ReferenceResolver } from '../../src/changeset/references.js';
import { Logger, type LogLevel } from '../../src/utils/logger.js';

export const MODULE_UUID = 'mod-1';
export const MODULE_ID = 'project/space';

export interface RawSnapshot {
  id: string;
  data_types?: Record<string, string[]>;
  requirement_types?: Record<string, unknown>;
  items?: unknown[];
}

export function createEmptyModule(): ModuleDump {
  return {
    uuid: MODULE_UUID,
    identifier: MODULE_ID,
    long_name: 'Space',
    types_folders: [],
    folders: [],
    requirements: [],
  };
}

export function createBaselineModule(): ModuleDump {
  return {
    uuid: MODULE_UUID,
    identifier: MODULE_ID,
    long_name: 'Space',
    types_folders: [
      {
        uuid: 'tf-1',
        identifier: '-2',
        long_name: 'Types',
        data_type_definitions: [
          {
            uuid: 'dt-status',
            long_name: 'Status',
            values: [
              { uuid: 'ev-open', long_name: 'Open' },
              { uuid: 'ev-closed', long_name: 'Closed' },
            ],
          },
        ],
        requirement_types: [
          {
            uuid: 'rt-req',
            identifier: 'req',
            long_name: 'Requirement',
            attribute_definitions: [
              {
                uuid: 'ad-status',
                _type: 'AttributeDefinitionEnumeration',
                identifier: 'Status req',
                long_name: 'Status',
                data_type: 'dt-status',
                multi_valued: true,
              },
              {
                uuid: 'ad-priority',
                _type: 'AttributeDefinition',
                identifier: 'Priority req',
                long_name: 'Priority',
              },
            ],
          },
        ],
      },
    ],
    folders: [
      {
        uuid: 'f-1',
        identifier: '1',
        long_name: 'Functional',
        attributes: [],
        folders: [],
        requirements: [
          {
            uuid: 'r-2',
            identifier: '2',
            long_name: 'Login',
            type: 'rt-req',
            attributes: [
              { uuid: 'av-2-status', _type: 'enum', definition: 'ad-status', values: ['ev-open'] },
              { uuid: 'av-2-priority', _type: 'integer', definition: 'ad-priority', value: 3 },
            ],
          },
        ],
      },
    ],
    requirements: [
      {
        uuid: 'r-3',
        identifier: '3',
        long_name: 'Logout',
        type: 'rt-req',
        attributes: [],
      },
    ],
  };
}

export function createModelDump(...modules: ModuleDump[]): ModelDump {
  return { modules };
}

export function createModel(...modules: ModuleDump[]): MemoryModel {
  return MemoryModel.fromDump(createModelDump(...modules));
}

/**
 * Type system of the baseline, as exported by the tracker
 */
export function baselineTypes(): Pick<RawSnapshot, 'data_types' | 'requirement_types'> {
  return {
    data_types: { Status: ['Open', 'Closed'] },
    requirement_types: {
      req: {
        long_name: 'Requirement',
        attributes: {
          Status: { type: 'Enum', multi_values: true },
          Priority: { type: 'Integer' },
        },
      },
    },
  };
}

/**
 * Items of the baseline, as exported by the tracker
 */
export function baselineItems(): unknown[] {
  return [
    {
      id: '1',
      long_name: 'Functional',
      children: [
        {
          id: '2',
          long_name: 'Login',
          type: 'req',
          attributes: { Status: ['Open'], Priority: 3 },
        },
      ],
    },
    { id: '3', long_name: 'Logout', type: 'req' },
  ];
}

export function createRawSnapshot(overrides: Partial<RawSnapshot> = {}): RawSnapshot {
  return {
    id: MODULE_ID,
    ...baselineTypes(),
    items: baselineItems(),
    ...overrides,
  };
}

export function createBaselineSnapshot(overrides: Partial<RawSnapshot> = {}): TrackerSnapshot {
  return ingestSnapshot(createRawSnapshot(overrides));
}

// =============================================================================
// Logging
// =============================================================================

export interface CapturedLine {
  level: LogLevel;
  line: string;
}

/**
 * Logger that records formatted lines instead of writing them
 */
export function createCaptureLogger(level: LogLevel = 'debug'): {
  logger: Logger;
  lines: CapturedLine[];
} {
  const lines: CapturedLine[] = [];
  const logger = new Logger({
    level,
    timestamps: false,
    sink: (entryLevel, line) => {
      lines.push({ level: entryLevel, line });
    },
  });
  return { logger, lines };
}

// =============================================================================
// Reconcile context
// =============================================================================

/**
 * Context for reconciling the first module of `model` against `snapshot`
 */
export function createContext(
  model: MemoryModel,
  snapshot: TrackerSnapshot,
  logger: Logger = createCaptureLogger().logger
): ReconcileContext {
  const module = model.modules[0];
  const typesFolder = model.typesFolder(module);
  return {
    graph: model,
    module,
    typesFolder,
    snapshot,
    resolver: new ReferenceResolver(model, typesFolder),
    logger,
  };
}
