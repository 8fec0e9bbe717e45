/**
 * @fileoverview Error Hierarchy for sbstore-dump
 *
 * All errors extend from DumpError, which provides:
 * - Error codes for programmatic handling
 * - Cause chaining for error context
 * - Consistent serialization
 *
 * FormatError is the only error the decoding core throws. ScanError and
 * ConfigError belong to the outer file and CLI layers.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { isFormatError, decodeList } from 'sbstore-dump'
 *
 * const result = decodeList(storeBytes, psetBytes)
 * if (!result.ok) {
 *   console.log(`${result.error.code}: ${result.error.message}`)
 * }
 * ```
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Error codes for the DumpError base class.
 */
export type DumpErrorCode =
  | 'UNKNOWN'
  | 'INVALID_ARGUMENT'
  | 'INTERNAL'

/**
 * Base error class for all sbstore-dump errors.
 *
 * @example
 * ```typescript
 * try {
 *   await riskyOperation()
 * } catch (cause) {
 *   throw new DumpError('Wrapper error', 'INTERNAL', { cause })
 * }
 * ```
 */
export class DumpError extends Error {
  /**
   * Error code for programmatic handling.
   */
  readonly code: string

  /**
   * The underlying cause of this error, if any.
   */
  override readonly cause?: unknown

  /**
   * Creates a new DumpError.
   *
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param options - Additional options including cause
   */
  constructor(
    message: string,
    code: DumpErrorCode | string = 'UNKNOWN',
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'DumpError'
    this.code = code
    this.cause = options?.cause

    // Maintains proper stack trace for where the error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serializes the error to a plain object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }

  /**
   * Wraps another error as the cause of a new DumpError.
   */
  static wrap(cause: unknown, message?: string): DumpError {
    const msg = message || (cause instanceof Error ? cause.message : String(cause))
    return new DumpError(msg, 'INTERNAL', { cause })
  }
}

// =============================================================================
// Format Errors
// =============================================================================

/**
 * Error codes for store and prefix set decoding.
 */
export type FormatErrorCode =
  | 'TRUNCATED'
  | 'DECOMPRESSION_ERROR'
  | 'SLICE_LENGTH_MISMATCH'
  | 'PREFIX_COUNT_MISMATCH'
  | 'TRAILING_DATA'
  | 'INVALID_INDEX'
  | 'CHECKSUM_MISMATCH'

/**
 * Structured context attached to a FormatError.
 */
export interface FormatErrorContext {
  /** What was being read when the error occurred (e.g. 'header', 'slice 2') */
  field?: string
  /** Byte offset in the input where the failing read started */
  offset?: number
  /** Expected length, count or digest */
  expected?: number | string
  /** Actual length, count or digest */
  actual?: number | string
  cause?: unknown
}

/**
 * Error thrown when a store or prefix set file does not match the format.
 *
 * @description
 * Every FormatError is terminal for the list being decoded. The static
 * factories fill in expected/actual values so the caller can report
 * what disagreed without parsing the message.
 *
 * @example
 * ```typescript
 * try {
 *   parseStore(bytes)
 * } catch (error) {
 *   if (error instanceof FormatError && error.code === 'TRUNCATED') {
 *     console.log(`needed ${error.expected} bytes at ${error.offset}, had ${error.actual}`)
 *   }
 * }
 * ```
 */
export class FormatError extends DumpError {
  override readonly code: FormatErrorCode
  readonly field?: string
  readonly offset?: number
  readonly expected?: number | string
  readonly actual?: number | string

  constructor(message: string, code: FormatErrorCode, context: FormatErrorContext = {}) {
    super(message, code, { cause: context.cause })
    this.name = 'FormatError'
    this.code = code
    this.field = context.field
    this.offset = context.offset
    this.expected = context.expected
    this.actual = context.actual
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      offset: this.offset,
      expected: this.expected,
      actual: this.actual,
    }
  }

  /**
   * The input ended before a read of `wanted` bytes could complete.
   */
  static truncated(field: string, offset: number, wanted: number, available: number): FormatError {
    return new FormatError(
      `Unexpected end of data reading ${field} at offset ${offset}: wanted ${wanted} bytes, have ${available}`,
      'TRUNCATED',
      { field, offset, expected: wanted, actual: available }
    )
  }

  /**
   * A compressed slice could not be inflated.
   */
  static decompression(field: string, offset: number, reason: string, cause?: unknown): FormatError {
    return new FormatError(`Failed to inflate ${field} at offset ${offset}: ${reason}`, 'DECOMPRESSION_ERROR', {
      field,
      offset,
      cause,
    })
  }

  /**
   * A decompressed or raw slice does not hold exactly one byte per value.
   */
  static sliceLength(field: string, offset: number, expected: number, actual: number): FormatError {
    return new FormatError(
      `Slice length mismatch in ${field}: expected ${expected} bytes, got ${actual}`,
      'SLICE_LENGTH_MISMATCH',
      { field, offset, expected, actual }
    )
  }

  /**
   * The prefix set does not hold one prefix per add-prefix record.
   */
  static prefixCount(addPrefixes: number, prefixes: number): FormatError {
    return new FormatError(
      `Prefix count mismatch: store has ${addPrefixes} add prefixes, prefix set has ${prefixes} prefixes`,
      'PREFIX_COUNT_MISMATCH',
      { field: 'addPrefixes', expected: addPrefixes, actual: prefixes }
    )
  }

  /**
   * Bytes remain after the checksum.
   */
  static trailingData(offset: number, remaining: number): FormatError {
    return new FormatError(
      `File doesn't end where expected: ${remaining} bytes remaining at offset ${offset}`,
      'TRAILING_DATA',
      { field: 'eof', offset, expected: 0, actual: remaining }
    )
  }

  /**
   * A prefix set index entry points outside the delta array.
   */
  static invalidIndex(index: number, start: number, end: number, deltaCount: number): FormatError {
    return new FormatError(
      `Invalid prefix set index ${index}: delta range [${start}, ${end}) outside [0, ${deltaCount}]`,
      'INVALID_INDEX',
      { field: `index ${index}`, expected: deltaCount, actual: end < start ? start : end }
    )
  }

  /**
   * The stored checksum differs from the digest of the preceding bytes.
   */
  static checksumMismatch(offset: number, expected: string, actual: string): FormatError {
    return new FormatError(`Checksum mismatch: file has ${actual}, computed ${expected}`, 'CHECKSUM_MISMATCH', {
      field: 'checksum',
      offset,
      expected,
      actual,
    })
  }
}

// =============================================================================
// Scan Errors
// =============================================================================

/**
 * Error codes for locating and reading database files.
 */
export type ScanErrorCode =
  | 'NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'MISSING_PREFIX_SET'
  | 'READ_ERROR'

/**
 * Error thrown while discovering or reading `.sbstore`/`.pset` files.
 */
export class ScanError extends DumpError {
  override readonly code: ScanErrorCode

  /**
   * The path that caused the error.
   */
  readonly path: string

  constructor(message: string, code: ScanErrorCode, options: { path: string; cause?: unknown }) {
    super(message, code, { cause: options.cause })
    this.name = 'ScanError'
    this.code = code
    this.path = options.path
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
    }
  }

  static notFound(path: string, cause?: unknown): ScanError {
    return new ScanError(`Directory not found: ${path}`, 'NOT_FOUND', { path, cause })
  }

  static notADirectory(path: string): ScanError {
    return new ScanError(`Not a directory: ${path}`, 'NOT_A_DIRECTORY', { path })
  }

  static missingStore(path: string, cause?: unknown): ScanError {
    return new ScanError(`Store file not found: ${path}`, 'NOT_FOUND', { path, cause })
  }

  static missingPrefixSet(path: string, cause?: unknown): ScanError {
    return new ScanError(`Prefix set file not found: ${path}`, 'MISSING_PREFIX_SET', { path, cause })
  }

  static readError(path: string, cause: unknown): ScanError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new ScanError(`Failed to read ${path}: ${reason}`, 'READ_ERROR', { path, cause })
  }
}

// =============================================================================
// Config Errors
// =============================================================================

/**
 * Error thrown when CLI flags or environment settings are invalid.
 */
export class ConfigError extends DumpError {
  /**
   * Name of the offending option or environment variable.
   */
  readonly option: string

  constructor(message: string, option: string) {
    super(message, 'INVALID_ARGUMENT')
    this.name = 'ConfigError'
    this.option = option
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDumpError(error: unknown): error is DumpError {
  return error instanceof DumpError
}

export function isFormatError(error: unknown): error is FormatError {
  return error instanceof FormatError
}

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError
}

/**
 * Checks whether an error is a DumpError carrying the given code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return isDumpError(error) && error.code === code
}
