/**
 * req-sync library entry point
 *
 * Exposes change set calculation for callers that hold their own live graph
 * and snapshots; the CLI lives in `cli.ts`.
 */

export * from './changeset/index.js';
export { summarizeChangeSet, type ChangeSetSummary } from './changeset/summary.js';
export { dumpChangeSet, loadChangeSet } from './changeset/yaml.js';
export { ATTRIBUTE_KINDS } from './model/types.js';
export type {
  LiveGraph,
  LiveModule,
  LiveFolder,
  LiveRequirement,
  LiveWorkItem,
  LiveContainer,
  LiveTypesFolder,
  LiveRequirementType,
  LiveAttributeDefinition,
  LiveDataTypeDefinition,
  LiveEnumValue,
  LiveAttributeValue,
} from './model/types.js';
export { MemoryModel } from './model/memory.js';
export { loadModelDump, parseModelDump, type ModelDump } from './model/dump.js';
export { ingestSnapshot, ingestSnapshots, loadSnapshots } from './snapshot/ingest.js';
export { loadConfig, parseConfig } from './config/index.js';
export { LoadError, type LoadErrorCode } from './utils/load.js';
export { Logger, createLogger, logger, type LogLevel, type LoggerConfig } from './utils/logger.js';
