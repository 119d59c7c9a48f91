/**
 * Shared state of one module's change set calculation
 */

import type { LiveGraph, LiveModule, LiveTypesFolder } from '../model/types.js';
import type { Logger } from '../utils/logger.js';
import type { TrackerSnapshot } from './types.js';
import type { ReferenceResolver } from './references.js';

export interface ReconcileContext {
  readonly graph: LiveGraph;
  readonly module: LiveModule;
  /** Live types folder, if the module has one */
  readonly typesFolder: LiveTypesFolder | undefined;
  readonly snapshot: TrackerSnapshot;
  readonly resolver: ReferenceResolver;
  readonly logger: Logger;
}
