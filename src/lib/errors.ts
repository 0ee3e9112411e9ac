/**
 * winenv Error Hierarchy
 *
 * Typed error classes shared by the engine, the CLI and programmatic callers.
 *
 * Hierarchy:
 *   WinEnvError (base)
 *   ├── ConfigError
 *   │   └── InvalidConfigError
 *   ├── ValidationError (bad name/value/segment, carries issues)
 *   ├── RegistryError
 *   │   ├── AccessDeniedError
 *   │   └── RegistryOperationError
 *   ├── CodecError
 *   │   ├── MalformedInputError
 *   │   └── UnsupportedFormatError
 *   └── OperationError
 *       ├── NotFoundError
 *       │   ├── VariableNotFoundError
 *       │   └── SnapshotNotFoundError
 *       ├── VariableExistsError
 *       ├── ConflictDetectedError
 *       ├── PartialApplyError
 *       ├── NothingToUndoError / NothingToRedoError
 *       ├── OperationCancelledError
 *       └── SnapshotIntegrityError
 */

import type { Scope } from '../types.js'
import type { ValidationIssue } from './validation.js'

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all winenv errors
 */
export class WinEnvError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'WinEnvError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends WinEnvError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your winenv config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Thrown when a name, value or path segment fails validation.
 * Always raised before anything touches the registry.
 */
export class ValidationError extends WinEnvError {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[], subject?: string) {
    const first = issues[0]
    const summary = first ? first.message : 'validation failed'
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : ''
    super(
      subject ? `Invalid ${subject}: ${summary}${more}` : `${summary}${more}`,
      'VALIDATION_FAILED',
      {
        suggestion: 'Fix the reported issues and retry; nothing was changed',
        context: { issues: issues.map(i => ({ code: i.code, subject: i.subject, index: i.index })) }
      }
    )
    this.name = 'ValidationError'
    this.issues = issues
  }
}

// =============================================================================
// Registry Errors
// =============================================================================

export class RegistryError extends WinEnvError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'RegistryError'
  }
}

/**
 * Thrown when the process lacks the privilege a scope requires.
 * Never retried: elevation has to be re-requested by the caller.
 */
export class AccessDeniedError extends RegistryError {
  readonly scope: Scope

  constructor(scope: Scope, name?: string, cause?: Error) {
    const target = name ? `"${name}" in ${scope} scope` : `${scope} scope`
    super(
      `Access denied writing ${target}`,
      'ACCESS_DENIED',
      {
        suggestion: scope === 'system'
          ? 'System variables require an elevated (Administrator) process'
          : 'Check the permissions on HKEY_CURRENT_USER\\Environment',
        context: { scope, name },
        cause
      }
    )
    this.name = 'AccessDeniedError'
    this.scope = scope
  }
}

/**
 * Any other registry failure, surfaced verbatim with scope/name context
 */
export class RegistryOperationError extends RegistryError {
  constructor(operation: string, scope: Scope, detail: string, name?: string, cause?: Error) {
    super(
      `Registry ${operation} failed for ${name ? `"${name}" in ` : ''}${scope} scope: ${detail}`,
      'REGISTRY_OPERATION_FAILED',
      {
        context: { operation, scope, name },
        cause
      }
    )
    this.name = 'RegistryOperationError'
  }
}

// =============================================================================
// Codec Errors
// =============================================================================

export class CodecError extends WinEnvError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'CodecError'
  }
}

/**
 * Thrown when input bytes cannot be decoded; no batch is produced
 */
export class MalformedInputError extends CodecError {
  readonly format: string
  readonly line?: number

  constructor(format: string, reason: string, line?: number, cause?: Error) {
    super(
      line !== undefined
        ? `Malformed ${format} input at line ${line}: ${reason}`
        : `Malformed ${format} input: ${reason}`,
      'MALFORMED_INPUT',
      {
        suggestion: `Check that the file is a valid ${format} export`,
        context: { format, line },
        cause
      }
    )
    this.name = 'MalformedInputError'
    this.format = format
    this.line = line
  }
}

export class UnsupportedFormatError extends CodecError {
  constructor(format: string, supported: readonly string[]) {
    super(
      `Unsupported format: "${format}"`,
      'UNSUPPORTED_FORMAT',
      {
        suggestion: `Supported formats: ${supported.join(', ')}`,
        context: { format, supported: [...supported] }
      }
    )
    this.name = 'UnsupportedFormatError'
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends WinEnvError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'OperationError'
  }
}

/**
 * Base for "name or snapshot absent" failures
 */
export class NotFoundError extends OperationError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'NotFoundError'
  }
}

export class VariableNotFoundError extends NotFoundError {
  constructor(name: string, scope: Scope) {
    super(
      `Variable "${name}" not found in ${scope} scope`,
      'VARIABLE_NOT_FOUND',
      {
        suggestion: `Use "winenv list --scope ${scope}" to see available variables`,
        context: { name, scope }
      }
    )
    this.name = 'VariableNotFoundError'
  }
}

export class SnapshotNotFoundError extends NotFoundError {
  constructor(id: string) {
    super(
      `Snapshot "${id}" not found`,
      'SNAPSHOT_NOT_FOUND',
      {
        suggestion: 'Use "winenv snapshot list" to see available snapshots',
        context: { id }
      }
    )
    this.name = 'SnapshotNotFoundError'
  }
}

export class VariableExistsError extends OperationError {
  constructor(name: string, scope: Scope) {
    super(
      `Variable "${name}" already exists in ${scope} scope`,
      'VARIABLE_EXISTS',
      {
        suggestion: 'Use update to change an existing variable',
        context: { name, scope }
      }
    )
    this.name = 'VariableExistsError'
  }
}

/**
 * Thrown when a bulk import under the "fail" policy collides with existing names.
 * The whole batch is rejected.
 */
export class ConflictDetectedError extends OperationError {
  readonly names: string[]

  constructor(names: string[]) {
    super(
      `Import conflicts with existing variables: ${names.join(', ')}`,
      'CONFLICT_DETECTED',
      {
        suggestion: 'Re-run with conflict policy "skip" or "overwrite"',
        context: { names }
      }
    )
    this.name = 'ConflictDetectedError'
    this.names = names
  }
}

/**
 * Thrown when a multi-record apply fails partway through.
 * `applied` lists what reached the registry; `snapshotId` is the pre-apply backup.
 */
export class PartialApplyError extends OperationError {
  readonly applied: Array<{ scope: Scope; name: string }>
  readonly failed: { scope: Scope; name: string }
  readonly snapshotId: string | null

  constructor(
    applied: Array<{ scope: Scope; name: string }>,
    failed: { scope: Scope; name: string },
    snapshotId: string | null,
    cause: Error
  ) {
    super(
      `Apply failed at "${failed.name}" (${failed.scope}) after ${applied.length} change(s): ${cause.message}`,
      'PARTIAL_APPLY_FAILURE',
      {
        suggestion: snapshotId
          ? `Restore snapshot ${snapshotId} to return to the pre-apply state`
          : 'Inspect the applied changes and reconcile manually',
        context: { applied, failed, snapshotId },
        cause
      }
    )
    this.name = 'PartialApplyError'
    this.applied = applied
    this.failed = failed
    this.snapshotId = snapshotId
  }
}

export class NothingToUndoError extends OperationError {
  constructor() {
    super('Nothing to undo', 'NOTHING_TO_UNDO')
    this.name = 'NothingToUndoError'
  }
}

export class NothingToRedoError extends OperationError {
  constructor() {
    super('Nothing to redo', 'NOTHING_TO_REDO')
    this.name = 'NothingToRedoError'
  }
}

export class OperationCancelledError extends OperationError {
  constructor(operation: string) {
    super(
      `${operation} cancelled before any change was applied`,
      'OPERATION_CANCELLED',
      { context: { operation } }
    )
    this.name = 'OperationCancelledError'
  }
}

export class SnapshotIntegrityError extends OperationError {
  constructor(id: string, expected: string, actual: string) {
    super(
      `Snapshot "${id}" failed checksum verification`,
      'SNAPSHOT_CORRUPTED',
      {
        suggestion: 'The snapshot data was modified on disk; choose another snapshot',
        context: { id, expected, actual }
      }
    )
    this.name = 'SnapshotIntegrityError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isWinEnvError(error: unknown): error is WinEnvError {
  return error instanceof WinEnvError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError
}

export function isCodecError(error: unknown): error is CodecError {
  return error instanceof CodecError
}

export function isOperationError(error: unknown): error is OperationError {
  return error instanceof OperationError
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isWinEnvError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a WinEnvError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): WinEnvError {
  if (isWinEnvError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new WinEnvError(error.message, defaultCode, { cause: error })
  }
  return new WinEnvError(String(error), defaultCode)
}
