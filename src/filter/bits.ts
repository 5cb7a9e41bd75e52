/**
 * Packed bit vector backing ProbabilisticSet.
 *
 * Bit order is MSB-first: bit `i` lives in byte `floor(i / 8)` under the
 * mask `0x80 >> (i % 8)`. Indexing stays in plain arithmetic; shifts would
 * truncate positions at 2^31. The packed bytes are the persisted image, so this
 * order is part of the file format. Bits past `length` in the final byte
 * are always 0.
 *
 * @module filter/bits
 */

import { ImageLengthMismatchError } from '../errors'
import { logger } from '../utils/logger'

/**
 * Number of bytes needed to hold `bitLength` bits
 */
export function byteLengthFor(bitLength: number): number {
  return Math.ceil(bitLength / 8)
}

/** Set-bit count for every byte value */
const POPCOUNT = new Uint8Array(256)
for (let i = 1; i < 256; i++) {
  POPCOUNT[i] = (i & 1) + POPCOUNT[i >> 1]!
}

export class BitVector {
  private readonly bytes: Uint8Array

  constructor(readonly length: number) {
    this.bytes = new Uint8Array(byteLengthFor(length))
  }

  get byteLength(): number {
    return this.bytes.length
  }

  get(index: number): boolean {
    return (this.bytes[Math.floor(index / 8)]! & (0x80 >> index % 8)) !== 0
  }

  set(index: number): void {
    this.bytes[Math.floor(index / 8)]! |= 0x80 >> index % 8
  }

  /**
   * Number of bits currently set
   */
  count(): number {
    let total = 0
    for (let i = 0; i < this.bytes.length; i++) {
      total += POPCOUNT[this.bytes[i]!]!
    }
    return total
  }

  /**
   * Copy of the packed bytes
   */
  toBytes(): Uint8Array {
    return this.bytes.slice()
  }

  /**
   * Overwrite every bit from a packed image of exactly `byteLength` bytes.
   * Padding bits in the final byte are cleared.
   *
   * @throws ImageLengthMismatchError if the image is shorter or longer
   */
  load(image: Uint8Array): void {
    if (image.length !== this.bytes.length) {
      throw new ImageLengthMismatchError(this.bytes.length, image.length)
    }

    this.bytes.set(image)

    const tail = this.length % 8
    if (tail !== 0) {
      const last = this.bytes.length - 1
      const keep = (0xff << (8 - tail)) & 0xff
      if ((this.bytes[last]! & ~keep) !== 0) {
        logger.debug(`Clearing ${8 - tail} padding bits set in loaded image`)
      }
      this.bytes[last]! &= keep
    }
  }
}
