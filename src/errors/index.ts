/**
 * lexibloom Error Handling Module
 *
 * All errors extend from LexiBloomError, which carries:
 * - a stable error code for programmatic handling
 * - a context record for debugging
 * - cause chaining
 * - JSON serialization
 *
 * Error Hierarchy:
 * - LexiBloomError (base class)
 *   - ConfigurationError (invalid construction parameters or settings)
 *   - SerializationError (bit image or snapshot cannot be decoded)
 *   - StorageError (storage backend failures)
 *     - FileNotFoundError
 *     - AlreadyExistsError
 *     - PathTraversalError
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for lexibloom operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
  UNKNOWN_HASHER = 'UNKNOWN_HASHER',

  // Serialization errors
  SERIALIZATION_ERROR = 'SERIALIZATION_ERROR',
  IMAGE_LENGTH_MISMATCH = 'IMAGE_LENGTH_MISMATCH',
  INVALID_SNAPSHOT = 'INVALID_SNAPSHOT',
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',

  // Storage errors
  STORAGE_ERROR = 'STORAGE_ERROR',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  PATH_TRAVERSAL = 'PATH_TRAVERSAL',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format (for logs and CLI JSON output)
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all lexibloom errors.
 *
 * @example
 * ```typescript
 * throw new LexiBloomError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'insert',
 * })
 * ```
 */
export class LexiBloomError extends Error {
  override readonly name: string = 'LexiBloomError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

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

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof LexiBloomError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }

  /**
   * Read a string-valued context entry
   */
  protected contextString(key: string): string | undefined {
    const value = this.context[key]
    return typeof value === 'string' ? value : undefined
  }

  /**
   * Read a number-valued context entry
   */
  protected contextNumber(key: string): number | undefined {
    const value = this.context[key]
    return typeof value === 'number' ? value : undefined
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when construction parameters or settings are invalid.
 */
export class ConfigurationError extends LexiBloomError {
  override readonly name: string = 'ConfigurationError'

  constructor(
    message: string,
    context?: {
      configKey?: string
      expectedValue?: unknown
      actualValue?: unknown
    },
    cause?: Error,
    code: ErrorCode = ErrorCode.INVALID_CONFIG
  ) {
    super(message, code, { ...context }, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }

  /** Setting that failed validation */
  get configKey(): string | undefined {
    return this.contextString('configKey')
  }

  /** Rejected value */
  get actualValue(): unknown {
    return this.context.actualValue
  }
}

/**
 * Error thrown when a hash function name is not registered.
 */
export class UnknownHasherError extends ConfigurationError {
  override readonly name = 'UnknownHasherError'

  constructor(hasherName: string, known: readonly string[]) {
    super(
      `Unknown hash function: ${hasherName}. Known: ${known.join(', ')}`,
      { configKey: 'hasher', expectedValue: known, actualValue: hasherName },
      undefined,
      ErrorCode.UNKNOWN_HASHER
    )
    Object.setPrototypeOf(this, UnknownHasherError.prototype)
  }
}

// =============================================================================
// Serialization Errors
// =============================================================================

/**
 * Error thrown when a bit image or snapshot cannot be decoded.
 */
export class SerializationError extends LexiBloomError {
  override readonly name: string = 'SerializationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SERIALIZATION_ERROR,
    context?: {
      expectedBytes?: number
      actualBytes?: number
      offset?: number
      version?: number
    },
    cause?: Error
  ) {
    super(message, code, { ...context }, cause)
    Object.setPrototypeOf(this, SerializationError.prototype)
  }

  get expectedBytes(): number | undefined {
    return this.contextNumber('expectedBytes')
  }

  get actualBytes(): number | undefined {
    return this.contextNumber('actualBytes')
  }
}

/**
 * Error thrown when a flat image does not hold exactly the bit count of the set.
 */
export class ImageLengthMismatchError extends SerializationError {
  override readonly name = 'ImageLengthMismatchError'

  constructor(expectedBytes: number, actualBytes: number) {
    super(
      `Bit image length mismatch: expected ${expectedBytes} bytes, got ${actualBytes}`,
      ErrorCode.IMAGE_LENGTH_MISMATCH,
      { expectedBytes, actualBytes }
    )
    Object.setPrototypeOf(this, ImageLengthMismatchError.prototype)
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error thrown when a storage operation fails.
 */
export class StorageError extends LexiBloomError {
  override readonly name: string = 'StorageError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_ERROR,
    context?: {
      path?: string
      operation?: string
    },
    cause?: Error
  ) {
    super(message, code, { ...context }, cause)
    Object.setPrototypeOf(this, StorageError.prototype)
  }

  get path(): string | undefined {
    return this.contextString('path')
  }

  get operation(): string | undefined {
    return this.contextString('operation')
  }
}

/**
 * Error thrown when a file does not exist.
 */
export class FileNotFoundError extends StorageError {
  override readonly name = 'FileNotFoundError'

  constructor(path: string, cause?: Error) {
    super(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, { path }, cause)
    Object.setPrototypeOf(this, FileNotFoundError.prototype)
  }
}

/**
 * Error thrown when a create-only write finds an existing file.
 */
export class AlreadyExistsError extends StorageError {
  override readonly name = 'AlreadyExistsError'

  constructor(path: string, cause?: Error) {
    super(`File already exists: ${path}`, ErrorCode.ALREADY_EXISTS, { path }, cause)
    Object.setPrototypeOf(this, AlreadyExistsError.prototype)
  }
}

/**
 * Error thrown when a path traversal attempt is detected.
 */
export class PathTraversalError extends StorageError {
  override readonly name = 'PathTraversalError'

  constructor(path: string, cause?: Error) {
    super(`Path traversal attempt detected: ${path}`, ErrorCode.PATH_TRAVERSAL, { path }, cause)
    Object.setPrototypeOf(this, PathTraversalError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLexiBloomError(error: unknown): error is LexiBloomError {
  return error instanceof LexiBloomError
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

export function isSerializationError(error: unknown): error is SerializationError {
  return error instanceof SerializationError
}

/**
 * Check if an error is a StorageError (or any subclass)
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError
}

/**
 * Check if an error reports a missing file
 */
export function isNotFoundError(error: unknown): error is FileNotFoundError {
  return error instanceof FileNotFoundError ||
    (isLexiBloomError(error) && error.code === ErrorCode.FILE_NOT_FOUND)
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error in a LexiBloomError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): LexiBloomError {
  if (error instanceof LexiBloomError) {
    return error
  }

  if (error instanceof Error) {
    return new LexiBloomError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new LexiBloomError(String(error), ErrorCode.UNKNOWN, context)
}
