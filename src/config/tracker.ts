/**
 * Sync configuration loading
 *
 * The configuration names the live model and the modules to synchronize:
 *
 * ```yaml
 * model:
 *   path: model.yaml
 * modules:
 *   - uuid: 3f1d0c52-0000-4000-8000-000000000001
 *     external-id: project/space
 * ```
 *
 * A module entry without `uuid` is kept; the change set calculation reports
 * it as an invalid tracker configuration without affecting other modules.
 */

import { dirname } from 'node:path';
import type { SyncConfig, TrackerConfig } from '../changeset/types.js';
import {
  LoadError,
  isRecord,
  optionalList,
  optionalString,
  readYamlFile,
  requireString,
  resolvePath,
} from '../utils/load.js';

const CODE = 'INVALID_CONFIG';

/** Default configuration file name */
export const DEFAULT_CONFIG_PATH = 'req-sync.yaml';

function parseTrackerConfig(raw: unknown, path: string): TrackerConfig {
  if (!isRecord(raw)) {
    throw new LoadError(`Expected a mapping at ${path}`, CODE, { path });
  }
  const tracker: TrackerConfig = {};
  const uuid = optionalString(raw, 'uuid', path, CODE);
  if (uuid !== undefined) {
    tracker.uuid = uuid;
  }
  const externalId = optionalString(raw, 'external-id', path, CODE);
  if (externalId !== undefined) {
    tracker.externalId = externalId;
  }
  return tracker;
}

/**
 * Validate a parsed configuration document
 *
 * @param baseDir - directory relative model paths are resolved against
 * @throws LoadError with code INVALID_CONFIG on malformed input
 */
export function parseConfig(raw: unknown, baseDir?: string): SyncConfig {
  if (!isRecord(raw)) {
    throw new LoadError('Configuration must be a mapping', CODE);
  }

  const config: SyncConfig = {
    modules: optionalList(raw, 'modules', 'config', CODE).map((entry, i) =>
      parseTrackerConfig(entry, `config.modules[${i}]`)
    ),
  };

  const model = raw.model;
  if (model !== undefined && model !== null) {
    if (!isRecord(model)) {
      throw new LoadError('Expected a mapping at config.model', CODE, { path: 'config.model' });
    }
    config.model = { path: resolvePath(requireString(model, 'path', 'config.model', CODE), baseDir) };
  }

  return config;
}

/**
 * Load the configuration file
 *
 * @throws LoadError if the file is missing, unreadable or malformed
 */
export async function loadConfig(filePath: string = DEFAULT_CONFIG_PATH): Promise<SyncConfig> {
  const absolutePath = resolvePath(filePath);
  const raw = await readYamlFile(absolutePath);
  return parseConfig(raw, dirname(absolutePath));
}
