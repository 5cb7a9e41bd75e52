/**
 * FNV-1a string hashes (32, 64, 128 and 256 bit)
 *
 * Hashes the UTF-8 bytes of the input with the standard FNV offset bases
 * and primes. The 32-bit variant runs on Math.imul; the wider ones on
 * BigInt, masked to their width after every multiply.
 *
 * @see http://www.isthe.com/chongo/tech/comp/fnv/index.html
 * @module hash/fnv1a
 */

import type { StringHasher } from './types'

// =============================================================================
// Parameters
// =============================================================================

interface FnvParams {
  bits: number
  offset: bigint
  prime: bigint
}

const FNV_32: FnvParams = {
  bits: 32,
  offset: 0x811c9dc5n,
  prime: 0x01000193n,
}

const FNV_64: FnvParams = {
  bits: 64,
  offset: 0xcbf29ce484222325n,
  prime: 0x100000001b3n,
}

const FNV_128: FnvParams = {
  bits: 128,
  offset: 0x6c62272e07bb014262b821756295c58dn,
  prime: 0x0000000001000000000000000000013bn,
}

const FNV_256: FnvParams = {
  bits: 256,
  offset: 0xdd268dbcaac550362d98c384c4e576ccc8b1536847b6bbb31023b4c8caee0535n,
  prime: 0x0000000000000000000001000000000000000000000000000000000000000163n,
}

const encoder = new TextEncoder()

// =============================================================================
// Hash Functions
// =============================================================================

/**
 * FNV-1a over raw bytes at 32 bits, as a plain number
 */
export function fnv1a32Bytes(data: Uint8Array): number {
  let hash = 0x811c9dc5
  for (let i = 0; i < data.length; i++) {
    hash ^= data[i]!
    hash = Math.imul(hash, 0x01000193)
  }
  return hash >>> 0
}

/**
 * FNV-1a over raw bytes at any width
 */
export function fnv1aBytes(data: Uint8Array, params: FnvParams): bigint {
  const mask = (1n << BigInt(params.bits)) - 1n
  let hash = params.offset
  for (let i = 0; i < data.length; i++) {
    hash ^= BigInt(data[i]!)
    hash = (hash * params.prime) & mask
  }
  return hash
}

function defineFnv(params: FnvParams): StringHasher {
  const name = `fnv1a-${params.bits}`
  if (params.bits === 32) {
    return {
      name,
      bits: 32,
      hash: (input: string): bigint => BigInt(fnv1a32Bytes(encoder.encode(input))),
    }
  }
  return {
    name,
    bits: params.bits,
    hash: (input: string): bigint => fnv1aBytes(encoder.encode(input), params),
  }
}

export const fnv1a32: StringHasher = defineFnv(FNV_32)
export const fnv1a64: StringHasher = defineFnv(FNV_64)
export const fnv1a128: StringHasher = defineFnv(FNV_128)
export const fnv1a256: StringHasher = defineFnv(FNV_256)

export type { FnvParams }
export { FNV_32, FNV_64, FNV_128, FNV_256 }
