/**
 * Hash function capability consumed by ProbabilisticSet.
 *
 * @module hash/types
 */

/**
 * A deterministic string → unsigned integer hash.
 *
 * Implementations must return a non-negative integer below `2 ** bits`.
 * Two hashers handed to the same set should be distinct functions; the set
 * does not check this.
 */
export interface StringHasher {
  /** Registry name, recorded in snapshots (e.g. 'fnv1a-64') */
  readonly name: string
  /** Output width in bits */
  readonly bits: number
  hash(input: string): bigint
}
