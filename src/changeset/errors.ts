/**
 * Custom error classes for change set calculation
 * Provides friendly error messages for broken configurations and snapshots
 */

/**
 * Error codes raised while calculating a change set
 */
export type ChangeSetErrorCode =
  | 'INVALID_TRACKER_CONFIG'
  | 'MISSING_TARGET_MODULE'
  | 'INVALID_FIELD_VALUE';

/**
 * Base error class for change set calculation errors
 */
export class ChangeSetError extends Error {
  constructor(
    message: string,
    public readonly code: ChangeSetErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ChangeSetError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Error thrown when a tracker configuration lacks a required field
 */
export class InvalidTrackerConfigError extends ChangeSetError {
  constructor(
    public readonly field: string,
    public readonly index?: number
  ) {
    const where = index === undefined ? '' : ` (modules[${index}])`;
    super(
      `The given tracker configuration is missing '${field}' of the target requirements module${where}`,
      'INVALID_TRACKER_CONFIG',
      `Add '${field}' to the module entry in the configuration file`
    );
    this.name = 'InvalidTrackerConfigError';
  }
}

/**
 * Error thrown when the configured module cannot be found in the live model
 */
export class MissingTargetModuleError extends ChangeSetError {
  constructor(public readonly moduleUuid: string) {
    super(
      `Requirements module not found in model: ${moduleUuid}`,
      'MISSING_TARGET_MODULE',
      'Check the module uuid in the configuration against the model'
    );
    this.name = 'MissingTargetModuleError';
  }
}

/**
 * Error thrown when a snapshot attribute value does not match its definition
 */
export class InvalidFieldValueError extends ChangeSetError {
  constructor(
    public readonly attribute: string,
    public readonly value: unknown,
    public readonly key: 'value' | 'values'
  ) {
    super(
      `Broken snapshot: Invalid field ${key} '${describeValue(value)}' for ${attribute}`,
      'INVALID_FIELD_VALUE',
      `Fix the value of '${attribute}' in the tracker export`
    );
    this.name = 'InvalidFieldValueError';
  }
}

/**
 * Type guard to check if an error is a ChangeSetError
 */
export function isChangeSetError(error: unknown): error is ChangeSetError {
  return error instanceof ChangeSetError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isChangeSetError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

function describeValue(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value === undefined) {
    return 'undefined';
  }
  return JSON.stringify(value) ?? String(value);
}
