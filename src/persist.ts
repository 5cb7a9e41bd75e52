/**
 * Persisting sets on a storage backend.
 *
 * Two formats:
 * - snapshot: self-describing envelope (parameters + hash names + image)
 * - image: the bare packed bit vector; the reader must already know
 *   size, k and the hash pair
 *
 * @module persist
 */

import type { StorageBackend, WriteResult } from './storage/types'
import type { StringHasher } from './hash/types'
import { getHasher } from './hash/registry'
import { ProbabilisticSet } from './filter/ProbabilisticSet'
import type { ProbabilisticSetOptions } from './filter/ProbabilisticSet'
import { decodeSnapshot, encodeSnapshot } from './filter/snapshot'
import { logger } from './utils/logger'

export async function saveSnapshot(
  backend: StorageBackend,
  path: string,
  set: ProbabilisticSet
): Promise<WriteResult> {
  const result = await backend.writeAtomic(path, encodeSnapshot(set))
  logger.debug(`Saved snapshot ${path} (${result.size} bytes, k=${set.k}, size=${set.size})`)
  return result
}

/**
 * @throws FileNotFoundError if nothing is stored at `path`
 * @throws SerializationError if the stored bytes are not a valid snapshot
 */
export async function loadSnapshot(
  backend: StorageBackend,
  path: string,
  resolveHasher: (name: string) => StringHasher = getHasher
): Promise<ProbabilisticSet> {
  const data = await backend.read(path)
  const set = decodeSnapshot(data, resolveHasher)
  logger.debug(`Loaded snapshot ${path} (k=${set.k}, size=${set.size})`)
  return set
}

/**
 * Write the bare bit image
 */
export async function dumpImage(
  backend: StorageBackend,
  path: string,
  set: ProbabilisticSet
): Promise<WriteResult> {
  const result = await backend.writeAtomic(path, set.serialize())
  logger.debug(`Dumped ${result.size}-byte image to ${path}`)
  return result
}

/**
 * Replace the bits of `set` with the image stored at `path`
 *
 * @throws ImageLengthMismatchError if the stored image does not fit the set
 */
export async function ingestImage(
  backend: StorageBackend,
  path: string,
  set: ProbabilisticSet
): Promise<void> {
  set.deserialize(await backend.read(path))
  logger.debug(`Ingested image ${path} into ${set.size}-bit set`)
}

/**
 * Build a set from options and an image stored at `path`
 */
export async function openImage(
  backend: StorageBackend,
  path: string,
  options: ProbabilisticSetOptions
): Promise<ProbabilisticSet> {
  return ProbabilisticSet.fromImage(await backend.read(path), options)
}
