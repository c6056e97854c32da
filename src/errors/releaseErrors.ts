/**
 * Custom error classes for the release snapshot engine
 * Provides structured error information so the CLI can map failures to exit codes
 */

export type ReleaseErrorCode =
  | 'INVALID_VERSION'
  | 'MANIFEST_NOT_FOUND'
  | 'COLLABORATOR_FAILURE'
  | 'IO_FAILURE'
  | 'CONFIG_ERROR';

/**
 * Base error class for release operations
 */
export class ReleaseError extends Error {
  constructor(
    message: string,
    public readonly code: ReleaseErrorCode,
    public readonly data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Version text that cannot be parsed into 3 or 4 numeric segments
 */
export class InvalidVersionError extends ReleaseError {
  constructor(value: string, reason: string) {
    super(`Invalid version "${value}": ${reason}`, 'INVALID_VERSION', {
      value,
      reason
    });
  }
}

/**
 * Manifest file or its version element is missing (or ambiguous)
 */
export class ManifestNotFoundError extends ReleaseError {
  constructor(message: string, searchedIn: string) {
    super(message, 'MANIFEST_NOT_FOUND', { searchedIn });
  }
}

/**
 * External process (export/unpack CLI, git) failed or exited non-zero
 */
export class CollaboratorFailureError extends ReleaseError {
  constructor(command: string, exitCode: number | null, stderr: string) {
    const detail = stderr.trim() || `exited with code ${exitCode}`;
    super(`${command} failed: ${detail}`, 'COLLABORATOR_FAILURE', {
      command,
      exitCode,
      stderr
    });
  }
}

/**
 * File could not be read or written
 */
export class IOFailureError extends ReleaseError {
  constructor(operation: string, path: string, reason: string) {
    super(`Cannot ${operation} ${path}: ${reason}`, 'IO_FAILURE', {
      operation,
      path,
      reason
    });
  }
}

/**
 * Invalid run configuration (CLI flags, environment or config file)
 */
export class ConfigError extends ReleaseError {
  constructor(field: string, value: unknown, expected: string) {
    const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
    super(`Invalid ${field}: expected ${expected}, got "${displayValue}"`, 'CONFIG_ERROR', {
      field,
      value,
      expected
    });
  }
}

/**
 * Extract a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node errno code of a thrown value, if it carries one
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
