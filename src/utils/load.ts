/**
 * YAML file loading utilities shared by the config, snapshot and model loaders
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, isAbsolute } from 'node:path';
import { parse as parseYaml, type ParseOptions, type SchemaOptions, type DocumentOptions } from 'yaml';

/**
 * Loader error codes
 */
export type LoadErrorCode =
  | 'FILE_NOT_FOUND'
  | 'READ_ERROR'
  | 'PARSE_ERROR'
  | 'INVALID_CONFIG'
  | 'INVALID_SNAPSHOT'
  | 'INVALID_MODEL'
  | 'INVALID_CHANGESET';

/**
 * Error thrown when an input file cannot be loaded or has the wrong shape
 */
export class LoadError extends Error {
  constructor(
    message: string,
    public readonly code: LoadErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LoadError';
  }
}

export type YamlLoadOptions = ParseOptions & DocumentOptions & SchemaOptions;

/**
 * Resolve `filePath` against `basePath` (or the working directory)
 */
export function resolvePath(filePath: string, basePath?: string): string {
  return isAbsolute(filePath) ? filePath : resolve(basePath ?? process.cwd(), filePath);
}

/**
 * Read and parse a YAML file
 *
 * @throws LoadError if the file is missing, unreadable or not valid YAML
 */
export async function readYamlFile(
  filePath: string,
  options: YamlLoadOptions = {}
): Promise<unknown> {
  const absolutePath = resolvePath(filePath);

  if (!existsSync(absolutePath)) {
    throw new LoadError(`File not found: ${absolutePath}`, 'FILE_NOT_FOUND', {
      path: absolutePath,
    });
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new LoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      'READ_ERROR',
      { path: absolutePath, originalError: err }
    );
  }

  try {
    return parseYaml(content, options);
  } catch (err) {
    throw new LoadError(
      `Failed to parse YAML: ${err instanceof Error ? err.message : String(err)}`,
      'PARSE_ERROR',
      { path: absolutePath, originalError: err }
    );
  }
}

// =============================================================================
// Shape guards
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Read a required string field, accepting numbers (YAML ids like `42`)
 */
export function requireString(
  record: Record<string, unknown>,
  key: string,
  path: string,
  code: LoadErrorCode
): string {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw new LoadError(`Missing required field: ${path}.${key}`, code, { path, key });
}

/**
 * Read an optional string field
 */
export function optionalString(
  record: Record<string, unknown>,
  key: string,
  path: string,
  code: LoadErrorCode
): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw new LoadError(`Expected a string at ${path}.${key}`, code, { path, key, value });
}

/**
 * Read an optional list field
 */
export function optionalList(
  record: Record<string, unknown>,
  key: string,
  path: string,
  code: LoadErrorCode
): unknown[] {
  const value = record[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new LoadError(`Expected a list at ${path}.${key}`, code, { path, key });
  }
  return value;
}

/**
 * Read an optional mapping field
 */
export function optionalRecord(
  record: Record<string, unknown>,
  key: string,
  path: string,
  code: LoadErrorCode
): Record<string, unknown> {
  const value = record[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new LoadError(`Expected a mapping at ${path}.${key}`, code, { path, key });
  }
  return value;
}
