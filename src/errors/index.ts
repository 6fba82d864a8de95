/**
 * verbforms Error Handling Module
 *
 * Provides the error hierarchy shared by every stage of the extraction
 * pipeline. All errors extend from VerbFormsError which provides:
 * - Error codes for programmatic handling
 * - JSON serialization for run reports
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - VerbFormsError (base class)
 *   - DumpFormatError (input is not a recognizable dump, fatal)
 *   - DecompressionError (corrupt or truncated compressed stream, fatal)
 *   - EntryParseWarning (one malformed entry, recorded and skipped)
 *   - ConjugationSynthesisGap (slots with no form and no rule, recorded)
 *   - IndexWriteError (artifacts could not be replaced, fatal)
 *   - IndexLoadError (persisted artifacts unreadable or inconsistent)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

import type { SlotKey } from '../conjugation/types'

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for verbforms operations.
 * These codes are stable and appear in run reports.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Dump errors
  DUMP_FORMAT = 'DUMP_FORMAT',
  DECOMPRESSION = 'DECOMPRESSION',

  // Per-entry diagnostics
  ENTRY_PARSE = 'ENTRY_PARSE',
  SYNTHESIS_GAP = 'SYNTHESIS_GAP',

  // Index errors
  INDEX_WRITE = 'INDEX_WRITE',
  INDEX_LOCKED = 'INDEX_LOCKED',
  INDEX_LOAD = 'INDEX_LOAD',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format, used when errors are written into reports
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string
  /** Additional context data */
  context?: Record<string, unknown>
  /** Serialized cause (if error chaining) */
  cause?: SerializedError
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all verbforms errors.
 *
 * @example
 * ```typescript
 * throw new VerbFormsError('Operation failed', ErrorCode.INTERNAL, {
 *   stage: 'resolve',
 * })
 * ```
 */
export class VerbFormsError extends Error {
  override readonly name: string = 'VerbFormsError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for reports
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof VerbFormsError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }

  /**
   * Check if error is in a category (e.g. all INDEX_ variants)
   */
  isCategory(category: string): boolean {
    return this.code.includes(category)
  }
}

// =============================================================================
// Dump Errors
// =============================================================================

/**
 * Thrown when the outer container is not a MediaWiki XML export.
 * Aborts the run.
 */
export class DumpFormatError extends VerbFormsError {
  override readonly name = 'DumpFormatError'
  readonly path: string

  constructor(path: string, reason: string, cause?: Error) {
    super(`Unrecognized dump ${path}: ${reason}`, ErrorCode.DUMP_FORMAT, { path, reason }, cause)
    this.path = path
    Object.setPrototypeOf(this, DumpFormatError.prototype)
  }
}

/**
 * Thrown when the compressed stream is corrupt or truncated.
 * Aborts the run.
 */
export class DecompressionError extends VerbFormsError {
  override readonly name = 'DecompressionError'
  readonly path: string
  readonly compression: string

  constructor(path: string, compression: string, cause?: Error) {
    super(
      `Failed to decompress ${compression} dump ${path}${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.DECOMPRESSION,
      { path, compression },
      cause
    )
    this.path = path
    this.compression = compression
    Object.setPrototypeOf(this, DecompressionError.prototype)
  }
}

// =============================================================================
// Per-entry Diagnostics
// =============================================================================

/**
 * Reasons an entry can be skipped or degraded
 */
export type EntryParseReason =
  | 'malformed-page'
  | 'oversized-page'
  | 'missing-title'
  | 'unterminated-markup'
  | 'invalid-lemma'
  | 'missing-argument'
  | 'unresolved-reference'

/**
 * Non-fatal: one entry could not be parsed (or only partially).
 *
 * Never thrown by the pipeline; instances are handed to the Diagnostics
 * collector and summarized in the run report.
 */
export class EntryParseWarning extends VerbFormsError {
  override readonly name = 'EntryParseWarning'
  readonly reason: EntryParseReason
  readonly title: string | undefined

  constructor(reason: EntryParseReason, message: string, title?: string) {
    super(message, ErrorCode.ENTRY_PARSE, { reason, title })
    this.reason = reason
    this.title = title
    Object.setPrototypeOf(this, EntryParseWarning.prototype)
  }
}

/**
 * Non-fatal: the listed slots of a lemma had neither an explicit form nor a
 * synthesis rule, so they were left out of the expanded form set.
 */
export class ConjugationSynthesisGap extends VerbFormsError {
  override readonly name = 'ConjugationSynthesisGap'
  readonly lemma: string
  readonly slots: readonly SlotKey[]

  constructor(lemma: string, slots: readonly SlotKey[]) {
    super(
      `No form or rule for ${slots.length} slot(s) of "${lemma}"`,
      ErrorCode.SYNTHESIS_GAP,
      { lemma, slots }
    )
    this.lemma = lemma
    this.slots = slots
    Object.setPrototypeOf(this, ConjugationSynthesisGap.prototype)
  }
}

// =============================================================================
// Index Errors
// =============================================================================

/**
 * Thrown when the artifacts could not be written. The previously persisted
 * artifacts are left in place.
 */
export class IndexWriteError extends VerbFormsError {
  override readonly name: string = 'IndexWriteError'
  readonly outputDir: string

  constructor(
    outputDir: string,
    message: string,
    code: ErrorCode = ErrorCode.INDEX_WRITE,
    cause?: Error
  ) {
    super(`Failed to write index to ${outputDir}: ${message}`, code, { outputDir }, cause)
    this.outputDir = outputDir
    Object.setPrototypeOf(this, IndexWriteError.prototype)
  }
}

/**
 * Thrown when another run holds the output directory lock.
 */
export class IndexLockedError extends IndexWriteError {
  override readonly name = 'IndexLockedError'
  readonly lockPath: string

  constructor(outputDir: string, lockPath: string, cause?: Error) {
    super(outputDir, `lock ${lockPath} is held by another run`, ErrorCode.INDEX_LOCKED, cause)
    this.lockPath = lockPath
    Object.setPrototypeOf(this, IndexLockedError.prototype)
  }
}

/**
 * Thrown when persisted artifacts cannot be read back.
 */
export class IndexLoadError extends VerbFormsError {
  override readonly name = 'IndexLoadError'
  readonly directory: string

  constructor(directory: string, message: string, cause?: Error) {
    super(`Failed to load index from ${directory}: ${message}`, ErrorCode.INDEX_LOAD, { directory }, cause)
    this.directory = directory
    Object.setPrototypeOf(this, IndexLoadError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends VerbFormsError {
  override readonly name = 'ConfigurationError'
  readonly issues: readonly string[]

  constructor(message: string, issues: readonly string[] = [], cause?: Error) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      ErrorCode.INVALID_CONFIG,
      { issues },
      cause
    )
    this.issues = issues
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isVerbFormsError(error: unknown): error is VerbFormsError {
  return error instanceof VerbFormsError
}

export function isDumpFormatError(error: unknown): error is DumpFormatError {
  return error instanceof DumpFormatError
}

export function isDecompressionError(error: unknown): error is DecompressionError {
  return error instanceof DecompressionError
}

export function isEntryParseWarning(error: unknown): error is EntryParseWarning {
  return error instanceof EntryParseWarning
}

export function isIndexWriteError(error: unknown): error is IndexWriteError {
  return error instanceof IndexWriteError
}

/**
 * Dump-level and write-level errors abort a run; everything else is
 * contained per entry.
 */
export function isFatal(error: unknown): boolean {
  return (
    error instanceof DumpFormatError ||
    error instanceof DecompressionError ||
    error instanceof IndexWriteError ||
    error instanceof ConfigurationError
  )
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Wrap an unknown error into a VerbFormsError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): VerbFormsError {
  if (error instanceof VerbFormsError) {
    return error
  }

  if (error instanceof Error) {
    return new VerbFormsError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new VerbFormsError(String(error), ErrorCode.UNKNOWN, context)
}

/**
 * Narrow an unknown thrown value to an Error for cause chaining
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
