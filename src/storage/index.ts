/**
 * Storage backends
 *
 * @module storage
 */

export type { StorageBackend, WriteOptions, WriteResult } from './types'
export { MemoryBackend } from './MemoryBackend'
export { FsBackend } from './FsBackend'
export { generateEtag, normalizePath } from './utils'
