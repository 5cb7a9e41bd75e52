/**
 * Shared utility functions for storage backends
 */

import { fnv1a32Bytes } from '../hash/fnv1a'

/**
 * Generate a deterministic content tag (FNV-1a of the bytes plus size)
 *
 * @example
 * ```typescript
 * generateEtag(new Uint8Array([1, 2, 3])) === generateEtag(new Uint8Array([1, 2, 3]))
 * ```
 */
export function generateEtag(data: Uint8Array): string {
  return `${fnv1a32Bytes(data).toString(16)}-${data.length.toString(36)}`
}

/**
 * Normalize a storage path by removing leading slashes
 *
 * @example
 * ```typescript
 * normalizePath('/foo/bar')  // 'foo/bar'
 * normalizePath('foo/bar')   // 'foo/bar'
 * normalizePath('/')         // ''
 * ```
 */
export function normalizePath(path: string): string {
  return path.replace(/^\/+/, '')
}
