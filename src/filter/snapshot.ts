/**
 * Snapshot envelope
 *
 * Wraps the flat bit image with the parameters needed to reopen it:
 *
 * ```
 * offset  size  field
 * 0       4     magic "LXBF"
 * 4       1     format version
 * 5       4     k (uint32, big-endian)
 * 9       8     size in bits (uint64, big-endian)
 * 17      1     hashA name length L1, followed by L1 bytes of UTF-8
 * ..      1     hashB name length L2, followed by L2 bytes of UTF-8
 * ..      rest  flat image, exactly ceil(size / 8) bytes
 * ```
 *
 * @module filter/snapshot
 */

import {
  ConfigurationError,
  ErrorCode,
  ImageLengthMismatchError,
  SerializationError,
} from '../errors'
import { MAX_HASHER_NAME_BYTES, SNAPSHOT_MAGIC, SNAPSHOT_VERSION } from '../constants'
import { getHasher } from '../hash/registry'
import type { StringHasher } from '../hash/types'
import { byteLengthFor } from './bits'
import { ProbabilisticSet } from './ProbabilisticSet'

// =============================================================================
// Types
// =============================================================================

export interface SnapshotHeader {
  version: number
  k: number
  size: number
  hashA: string
  hashB: string
  /** Offset of the flat image within the snapshot */
  imageOffset: number
}

const FIXED_HEADER_BYTES = 17

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true })

// =============================================================================
// Encoding
// =============================================================================

function encodeName(name: string): Uint8Array {
  const bytes = encoder.encode(name)
  if (bytes.length > MAX_HASHER_NAME_BYTES) {
    throw new ConfigurationError(
      `Hash function name too long for a snapshot: ${bytes.length} bytes (max ${MAX_HASHER_NAME_BYTES})`,
      { configKey: 'hasher', actualValue: name }
    )
  }
  return bytes
}

/**
 * Encode a set, its parameters and hash function names
 */
export function encodeSnapshot(set: ProbabilisticSet): Uint8Array {
  const nameA = encodeName(set.hashA.name)
  const nameB = encodeName(set.hashB.name)
  const image = set.serialize()

  const total = FIXED_HEADER_BYTES + 1 + nameA.length + 1 + nameB.length + image.length
  const out = new Uint8Array(total)
  const view = new DataView(out.buffer)

  out.set(SNAPSHOT_MAGIC, 0)
  view.setUint8(4, SNAPSHOT_VERSION)
  view.setUint32(5, set.k)
  view.setBigUint64(9, BigInt(set.size))

  let offset = FIXED_HEADER_BYTES
  out[offset++] = nameA.length
  out.set(nameA, offset)
  offset += nameA.length
  out[offset++] = nameB.length
  out.set(nameB, offset)
  offset += nameB.length
  out.set(image, offset)

  return out
}

// =============================================================================
// Decoding
// =============================================================================

function truncated(offset: number, needed: number, available: number): SerializationError {
  return new SerializationError(
    `Snapshot truncated at offset ${offset}: need ${needed} bytes, have ${available}`,
    ErrorCode.INVALID_SNAPSHOT,
    { offset, expectedBytes: needed, actualBytes: available }
  )
}

function readName(data: Uint8Array, offset: number): { name: string; next: number } {
  if (offset >= data.length) {
    throw truncated(offset, 1, 0)
  }
  const length = data[offset]!
  const start = offset + 1
  if (start + length > data.length) {
    throw truncated(start, length, data.length - start)
  }
  try {
    return { name: decoder.decode(data.subarray(start, start + length)), next: start + length }
  } catch (error: unknown) {
    throw new SerializationError(
      `Hash function name at offset ${start} is not valid UTF-8`,
      ErrorCode.INVALID_SNAPSHOT,
      { offset: start },
      error instanceof Error ? error : undefined
    )
  }
}

/**
 * Parse and validate the snapshot header without touching the image
 *
 * @throws SerializationError for bad magic, unsupported version or a truncated header
 */
export function decodeSnapshotHeader(data: Uint8Array): SnapshotHeader {
  if (data.length < FIXED_HEADER_BYTES) {
    throw truncated(0, FIXED_HEADER_BYTES, data.length)
  }
  for (let i = 0; i < SNAPSHOT_MAGIC.length; i++) {
    if (data[i] !== SNAPSHOT_MAGIC[i]) {
      throw new SerializationError('Not a lexibloom snapshot (bad magic)', ErrorCode.INVALID_SNAPSHOT, {
        offset: 0,
      })
    }
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const version = view.getUint8(4)
  if (version !== SNAPSHOT_VERSION) {
    throw new SerializationError(
      `Unsupported snapshot version ${version} (expected ${SNAPSHOT_VERSION})`,
      ErrorCode.UNSUPPORTED_VERSION,
      { version }
    )
  }

  const k = view.getUint32(5)
  const rawSize = view.getBigUint64(9)
  if (rawSize > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new SerializationError(`Snapshot bit count ${rawSize} is out of range`, ErrorCode.INVALID_SNAPSHOT, {
      offset: 9,
    })
  }

  const first = readName(data, FIXED_HEADER_BYTES)
  const second = readName(data, first.next)

  return {
    version,
    k,
    size: Number(rawSize),
    hashA: first.name,
    hashB: second.name,
    imageOffset: second.next,
  }
}

/**
 * Rebuild a set from a snapshot.
 *
 * Hash names are resolved through `resolveHasher`, which defaults to the
 * built-in registry; pass a custom resolver for hashers created with
 * `createHasher`.
 *
 * @throws SerializationError if the header is invalid or the image length is wrong
 * @throws ConfigurationError if a hash name is unknown or the parameters are invalid
 */
export function decodeSnapshot(
  data: Uint8Array,
  resolveHasher: (name: string) => StringHasher = getHasher
): ProbabilisticSet {
  const header = decodeSnapshotHeader(data)
  const image = data.subarray(header.imageOffset)
  const expected = byteLengthFor(header.size)
  if (image.length !== expected) {
    throw new ImageLengthMismatchError(expected, image.length)
  }

  return ProbabilisticSet.fromImage(image, {
    size: header.size,
    k: header.k,
    hashA: resolveHasher(header.hashA),
    hashB: resolveHasher(header.hashB),
  })
}
