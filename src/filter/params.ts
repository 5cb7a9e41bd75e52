/**
 * Probe-count derivation.
 *
 * Construction options name the probe count in one of three ways. They are
 * folded into a tagged ProbeStrategy, which `resolveProbeCount` turns into a
 * single concrete `k` before the set is built.
 *
 * @module filter/params
 */

import { ConfigurationError } from '../errors'
import { logger } from '../utils/logger'
import { MAX_IMAGE_BYTES } from '../constants'

// =============================================================================
// Types
// =============================================================================

export type ProbeStrategy =
  | { kind: 'explicit'; k: number }
  | { kind: 'expected-items'; expectedItems: number }
  | { kind: 'size-heuristic' }

export interface ProbeCountOptions {
  /** Explicit probe count; wins over `expectedItems` */
  k?: number | undefined
  /** Expected number of distinct inserted items */
  expectedItems?: number | undefined
}

// =============================================================================
// Validation
// =============================================================================

/** Largest bit count whose image fits in MAX_IMAGE_BYTES */
export const MAX_SIZE = MAX_IMAGE_BYTES * 8

/**
 * @throws ConfigurationError unless `size` is a positive integer no larger
 * than MAX_SIZE
 */
export function validateSize(size: number): void {
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new ConfigurationError(`Bit count must be a positive integer, got ${size}`, {
      configKey: 'size',
      expectedValue: 'positive integer',
      actualValue: size,
    })
  }
  if (size > MAX_SIZE) {
    throw new ConfigurationError(`Bit count ${size} exceeds the maximum of ${MAX_SIZE}`, {
      configKey: 'size',
      expectedValue: `at most ${MAX_SIZE}`,
      actualValue: size,
    })
  }
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Pick the strategy named by the options
 */
export function toProbeStrategy(options: ProbeCountOptions): ProbeStrategy {
  if (options.k !== undefined) {
    return { kind: 'explicit', k: options.k }
  }
  if (options.expectedItems !== undefined) {
    return { kind: 'expected-items', expectedItems: options.expectedItems }
  }
  return { kind: 'size-heuristic' }
}

/**
 * Resolve a strategy to a concrete probe count for a set of `size` bits.
 *
 * - explicit: used as given; must be a positive integer
 * - expected-items: floor(size / n * ln 2)
 * - size-heuristic: floor(log2(size))
 *
 * A derived count below 1 is raised to 1.
 *
 * @throws ConfigurationError for an invalid explicit `k` or `expectedItems`
 */
export function resolveProbeCount(size: number, strategy: ProbeStrategy): number {
  validateSize(size)

  switch (strategy.kind) {
    case 'explicit': {
      if (!Number.isSafeInteger(strategy.k) || strategy.k <= 0) {
        throw new ConfigurationError(`Probe count must be a positive integer, got ${strategy.k}`, {
          configKey: 'k',
          expectedValue: 'positive integer',
          actualValue: strategy.k,
        })
      }
      return strategy.k
    }
    case 'expected-items': {
      const n = strategy.expectedItems
      if (!Number.isFinite(n) || n <= 0) {
        throw new ConfigurationError(`Expected item count must be a positive number, got ${n}`, {
          configKey: 'expectedItems',
          expectedValue: 'positive number',
          actualValue: n,
        })
      }
      return atLeastOne(Math.floor((size / n) * Math.LN2), strategy)
    }
    case 'size-heuristic':
      return atLeastOne(Math.floor(Math.log2(size)), strategy)
  }
}

function atLeastOne(k: number, strategy: ProbeStrategy): number {
  if (k >= 1) {
    return k
  }
  logger.warn(`Derived probe count ${k} from ${strategy.kind} strategy; using 1`)
  return 1
}
