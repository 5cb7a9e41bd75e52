/**
 * Hash function registry and adapters.
 *
 * Snapshots, configuration and the CLI refer to hash functions by name;
 * the registry maps those names back to the built-in FNV-1a family.
 *
 * @module hash/registry
 */

import { ConfigurationError, UnknownHasherError } from '../errors'
import { fnv1a32, fnv1a64, fnv1a128, fnv1a256 } from './fnv1a'
import type { StringHasher } from './types'

const BUILTIN_HASHERS: readonly StringHasher[] = [fnv1a32, fnv1a64, fnv1a128, fnv1a256]

const registry = new Map<string, StringHasher>(
  BUILTIN_HASHERS.map((hasher) => [hasher.name, hasher])
)

/**
 * Look up a built-in hash function by name
 *
 * @throws UnknownHasherError if the name is not registered
 */
export function getHasher(name: string): StringHasher {
  const hasher = registry.get(name)
  if (!hasher) {
    throw new UnknownHasherError(name, listHashers())
  }
  return hasher
}

/**
 * Names of every built-in hash function
 */
export function listHashers(): string[] {
  return [...registry.keys()]
}

/**
 * Adapt a plain function to the StringHasher capability.
 *
 * Number results must be non-negative safe integers; bigint results must
 * be non-negative. Anything else is a programming error in the supplied
 * function and raises ConfigurationError from the hashing call.
 *
 * @example
 * ```typescript
 * const djb2 = createHasher('djb2', 32, (s) => {
 *   let h = 5381
 *   for (let i = 0; i < s.length; i++) h = ((h << 5) + h) ^ s.charCodeAt(i)
 *   return h >>> 0
 * })
 * ```
 */
export function createHasher(
  name: string,
  bits: number,
  fn: (input: string) => number | bigint
): StringHasher {
  if (!Number.isInteger(bits) || bits <= 0) {
    throw new ConfigurationError(`Hash width must be a positive integer, got ${bits}`, {
      configKey: 'bits',
      actualValue: bits,
    })
  }

  return {
    name,
    bits,
    hash(input: string): bigint {
      const value = fn(input)
      if (typeof value === 'bigint') {
        if (value < 0n) {
          throw new ConfigurationError(`Hash function ${name} returned a negative value`, {
            configKey: name,
            actualValue: String(value),
          })
        }
        return value
      }
      if (!Number.isSafeInteger(value) || value < 0) {
        throw new ConfigurationError(
          `Hash function ${name} must return a non-negative integer, got ${value}`,
          { configKey: name, actualValue: value }
        )
      }
      return BigInt(value)
    },
  }
}
