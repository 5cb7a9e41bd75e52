/**
 * lexibloom
 *
 * Bloom-style probabilistic membership with enhanced double hashing and a
 * graded confidence query.
 *
 * @example
 * ```typescript
 * import { ProbabilisticSet, fnv1a32, fnv1a64 } from 'lexibloom'
 *
 * const words = new ProbabilisticSet({ size: 2 ** 22, k: 12, hashA: fnv1a32, hashB: fnv1a64 })
 * words.insertAll(['apple', 'banana'])
 * words.contains('apple')      // true
 * words.confidence('appel')    // fraction of probe bits set, 0..1
 * ```
 *
 * @packageDocumentation
 */

// Core
export {
  ProbabilisticSet,
  BitVector,
  byteLengthFor,
  MAX_SIZE,
  resolveProbeCount,
  toProbeStrategy,
  encodeSnapshot,
  decodeSnapshot,
  decodeSnapshotHeader,
} from './filter'
export type {
  ProbabilisticSetOptions,
  ProbabilisticSetStats,
  ProbeStrategy,
  ProbeCountOptions,
  SnapshotHeader,
} from './filter'

// Hash functions
export { fnv1a32, fnv1a64, fnv1a128, fnv1a256, getHasher, listHashers, createHasher } from './hash'
export type { StringHasher } from './hash'

// Word lists
export { parseWordList, loadWordList, wordSetOptions, createWordSet, matchStrength } from './corpus'

// Persistence
export { saveSnapshot, loadSnapshot, dumpImage, ingestImage, openImage } from './persist'
export { MemoryBackend, FsBackend } from './storage'
export type { StorageBackend, WriteOptions, WriteResult } from './storage'

// Configuration
export { DEFAULT_CONFIG, defineConfig, configFromEnv, resolveConfig, toSetOptions, applyLogging } from './config'
export type { LexiBloomConfig, Env } from './config'

// Errors
export {
  ErrorCode,
  LexiBloomError,
  ConfigurationError,
  UnknownHasherError,
  SerializationError,
  ImageLengthMismatchError,
  StorageError,
  FileNotFoundError,
  AlreadyExistsError,
  PathTraversalError,
  isLexiBloomError,
  isConfigurationError,
  isSerializationError,
  isStorageError,
  isNotFoundError,
  wrapError,
} from './errors'
export type { SerializedError } from './errors'

// Logging
export { logger, setLogger, consoleLogger, noopLogger, createConsoleLogger } from './utils/logger'
export type { Logger, LogLevel, ConsoleLoggerOptions } from './utils/logger'
