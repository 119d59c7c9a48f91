/**
 * Shared types and interfaces for the req-sync CLI
 */

import type { ChangeSetSummary } from './changeset/summary.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Configuration file (modules and model location) */
  config: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Per-module outcome shown by `diff` and `check`
 */
export interface ModuleReport {
  /** Configured module uuid, if any */
  uuid?: string;
  snapshotId?: string;
  status: 'changed' | 'up-to-date' | 'failed';
  summary?: ChangeSetSummary;
  error?: string;
}
