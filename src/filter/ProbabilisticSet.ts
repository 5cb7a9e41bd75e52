/**
 * ProbabilisticSet - Bloom-style membership filter
 *
 * A fixed-size bit vector probed with enhanced double hashing: two hash
 * evaluations per item yield all `k` probe positions
 *
 *   probe_i = (h1 + i * h2) mod size,  i = 0 .. k-1
 *
 * Membership answers are one-sided: `contains` never returns false for an
 * inserted item, but may return true for one that was never inserted.
 * `confidence` reports the fraction of an item's probe bits that are set;
 * it is a graded match-strength signal, not a calibrated probability.
 *
 * Caller contract: if `hashB(item) mod size` is 0, every probe of that item
 * lands on the same bit. Supply well-mixed, distinct hash functions.
 *
 * The set is synchronous and meant for single-threaded use. There is no
 * removal and no resizing.
 *
 * @module filter/ProbabilisticSet
 */

import type { StringHasher } from '../hash/types'
import { BitVector } from './bits'
import { resolveProbeCount, toProbeStrategy, validateSize } from './params'
import type { ProbeCountOptions } from './params'

// =============================================================================
// Types
// =============================================================================

export interface ProbabilisticSetOptions extends ProbeCountOptions {
  /** Total bit count */
  size: number
  /** Hash producing the probe start position */
  hashA: StringHasher
  /** Hash producing the probe stride */
  hashB: StringHasher
}

/**
 * Figures derived from the current bits. Nothing here is tracked
 * incrementally; every call rescans the vector.
 */
export interface ProbabilisticSetStats {
  size: number
  k: number
  setBits: number
  /** setBits / size */
  fillRatio: number
  /** -(size / k) * ln(1 - fillRatio); Infinity once every bit is set */
  estimatedItems: number
  /** fillRatio ^ k */
  estimatedFalsePositiveRate: number
}

// =============================================================================
// ProbabilisticSet
// =============================================================================

export class ProbabilisticSet {
  readonly size: number
  readonly k: number
  readonly hashA: StringHasher
  readonly hashB: StringHasher

  private readonly bits: BitVector
  private readonly modulus: bigint

  /**
   * @throws ConfigurationError if `size` is not a positive integer, or `k` /
   * `expectedItems` is invalid
   */
  constructor(options: ProbabilisticSetOptions) {
    validateSize(options.size)
    this.size = options.size
    this.k = resolveProbeCount(options.size, toProbeStrategy(options))
    this.hashA = options.hashA
    this.hashB = options.hashB
    this.bits = new BitVector(options.size)
    this.modulus = BigInt(options.size)
  }

  /**
   * Build a set and load a flat image into it
   *
   * @throws ImageLengthMismatchError if the image is not ceil(size / 8) bytes
   */
  static fromImage(image: Uint8Array, options: ProbabilisticSetOptions): ProbabilisticSet {
    const set = new ProbabilisticSet(options)
    set.deserialize(image)
    return set
  }

  /** Length in bytes of the serialized image */
  get byteLength(): number {
    return this.bits.byteLength
  }

  // ===========================================================================
  // Insertion
  // ===========================================================================

  insert(item: string): void {
    let position = this.startOf(item)
    const stride = this.strideOf(item)
    for (let i = 0; i < this.k; i++) {
      this.bits.set(position)
      position = this.advance(position, stride)
    }
  }

  /**
   * Insert every item, in iteration order
   */
  insertAll(items: Iterable<string>): void {
    for (const item of items) {
      this.insert(item)
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * True iff every probe bit of `item` is set
   */
  contains(item: string): boolean {
    let position = this.startOf(item)
    const stride = this.strideOf(item)
    for (let i = 0; i < this.k; i++) {
      if (!this.bits.get(position)) {
        return false
      }
      position = this.advance(position, stride)
    }
    return true
  }

  /**
   * Fraction of the item's `k` probe bits that are set, in [0, 1].
   *
   * Heuristic only. 1 is equivalent to `contains(item)`; 0 means no probe
   * bit matched.
   */
  confidence(item: string): number {
    let position = this.startOf(item)
    const stride = this.strideOf(item)
    let matched = 0
    for (let i = 0; i < this.k; i++) {
      if (this.bits.get(position)) {
        matched++
      }
      position = this.advance(position, stride)
    }
    return matched / this.k
  }

  /**
   * Probe positions of `item`, in probe order
   */
  probes(item: string): number[] {
    const positions: number[] = []
    let position = this.startOf(item)
    const stride = this.strideOf(item)
    for (let i = 0; i < this.k; i++) {
      positions.push(position)
      position = this.advance(position, stride)
    }
    return positions
  }

  countSetBits(): number {
    return this.bits.count()
  }

  stats(): ProbabilisticSetStats {
    const setBits = this.bits.count()
    const fillRatio = setBits / this.size
    const estimatedItems =
      setBits === this.size ? Infinity : -(this.size / this.k) * Math.log(1 - fillRatio)
    return {
      size: this.size,
      k: this.k,
      setBits,
      fillRatio,
      estimatedItems,
      estimatedFalsePositiveRate: Math.pow(fillRatio, this.k),
    }
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  /**
   * Packed MSB-first image of exactly ceil(size / 8) bytes
   */
  serialize(): Uint8Array {
    return this.bits.toBytes()
  }

  /**
   * Replace every bit with the contents of a packed image
   *
   * @throws ImageLengthMismatchError if the image is not ceil(size / 8) bytes
   */
  deserialize(image: Uint8Array): void {
    this.bits.load(image)
  }

  // ===========================================================================
  // Probe arithmetic
  // ===========================================================================

  // (h1 + i*h2) mod m is walked as p_0 = h1 mod m, p_{i+1} = (p_i + h2 mod m) mod m;
  // every intermediate stays below 2m.

  private startOf(item: string): number {
    return Number(this.hashA.hash(item) % this.modulus)
  }

  private strideOf(item: string): number {
    return Number(this.hashB.hash(item) % this.modulus)
  }

  private advance(position: number, stride: number): number {
    const next = position + stride
    return next >= this.size ? next - this.size : next
  }
}
