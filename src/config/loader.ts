/**
 * Configuration Loader
 *
 * Resolves set parameters from explicit overrides, then environment
 * variables, then the word-list preset defaults:
 *
 *   LEXIBLOOM_SIZE            bit count
 *   LEXIBLOOM_K               probe count
 *   LEXIBLOOM_EXPECTED_ITEMS  expected item count (used when no k is set)
 *   LEXIBLOOM_HASH_A          hash name for probe start
 *   LEXIBLOOM_HASH_B          hash name for probe stride
 *   LEXIBLOOM_DEBUG           '1' / 'true' enables console logging
 */

import { ConfigurationError } from '../errors'
import { getHasher } from '../hash/registry'
import type { ProbabilisticSetOptions } from '../filter/ProbabilisticSet'
import { validateSize } from '../filter/params'
import { WORD_SET_HASH_A, WORD_SET_HASH_B, WORD_SET_PROBES, WORD_SET_SIZE } from '../constants'
import { consoleLogger, noopLogger, setLogger } from '../utils/logger'

/**
 * lexibloom configuration options
 */
export interface LexiBloomConfig {
  /** Total bit count */
  size: number
  /** Probe count; when absent, derived from `expectedItems` or `size` */
  k?: number | undefined
  /** Expected number of distinct items */
  expectedItems?: number | undefined
  /** Registered hash name for probe start */
  hashA: string
  /** Registered hash name for probe stride */
  hashB: string
  /** Enable debug logging */
  debug: boolean
}

export type Env = Record<string, string | undefined>

export const DEFAULT_CONFIG: Readonly<LexiBloomConfig> = {
  size: WORD_SET_SIZE,
  k: WORD_SET_PROBES,
  hashA: WORD_SET_HASH_A,
  hashB: WORD_SET_HASH_B,
  debug: false,
}

/**
 * Type helper for configuration objects
 */
export function defineConfig(config: Partial<LexiBloomConfig>): Partial<LexiBloomConfig> {
  return config
}

// =============================================================================
// Environment parsing
// =============================================================================

function parseIntegerVar(env: Env, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') {
    return undefined
  }
  const value = Number(raw)
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`, {
      configKey: key,
      expectedValue: 'positive integer',
      actualValue: raw,
    })
  }
  return value
}

function parseBooleanVar(env: Env, key: string): boolean | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') {
    return undefined
  }
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true
    case '0':
    case 'false':
    case 'no':
      return false
    default:
      throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`, {
        configKey: key,
        expectedValue: 'true | false | 1 | 0',
        actualValue: raw,
      })
  }
}

/**
 * Read the LEXIBLOOM_* variables present in `env`
 */
export function configFromEnv(env: Env = process.env): Partial<LexiBloomConfig> {
  const config: Partial<LexiBloomConfig> = {}

  const size = parseIntegerVar(env, 'LEXIBLOOM_SIZE')
  if (size !== undefined) config.size = size

  const k = parseIntegerVar(env, 'LEXIBLOOM_K')
  if (k !== undefined) config.k = k

  const expectedItems = parseIntegerVar(env, 'LEXIBLOOM_EXPECTED_ITEMS')
  if (expectedItems !== undefined) config.expectedItems = expectedItems

  const hashA = env.LEXIBLOOM_HASH_A?.trim()
  if (hashA) config.hashA = hashA

  const hashB = env.LEXIBLOOM_HASH_B?.trim()
  if (hashB) config.hashB = hashB

  const debug = parseBooleanVar(env, 'LEXIBLOOM_DEBUG')
  if (debug !== undefined) config.debug = debug

  return config
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Pick a probe-count source. An explicit `expectedItems` at a higher layer
 * replaces a `k` from a lower one. The preset `k` belongs to the preset
 * size; any other size with no count given gets floor(log2(size)) from
 * ProbabilisticSet.
 */
function resolveProbeSource(
  size: number,
  layers: Array<Partial<LexiBloomConfig>>
): Pick<LexiBloomConfig, 'k' | 'expectedItems'> {
  for (const layer of layers) {
    if (layer.k !== undefined) return { k: layer.k }
    if (layer.expectedItems !== undefined) return { expectedItems: layer.expectedItems }
  }
  return size === DEFAULT_CONFIG.size ? { k: DEFAULT_CONFIG.k } : {}
}

/**
 * Merge overrides over environment over defaults, then validate
 *
 * @throws ConfigurationError for invalid sizes, counts or unknown hash names
 */
export function resolveConfig(
  overrides: Partial<LexiBloomConfig> = {},
  env: Env = process.env
): LexiBloomConfig {
  const fromEnv = configFromEnv(env)
  const size = overrides.size ?? fromEnv.size ?? DEFAULT_CONFIG.size
  const config: LexiBloomConfig = {
    size,
    hashA: overrides.hashA ?? fromEnv.hashA ?? DEFAULT_CONFIG.hashA,
    hashB: overrides.hashB ?? fromEnv.hashB ?? DEFAULT_CONFIG.hashB,
    debug: overrides.debug ?? fromEnv.debug ?? DEFAULT_CONFIG.debug,
    ...resolveProbeSource(size, [overrides, fromEnv]),
  }

  validateSize(config.size)
  getHasher(config.hashA)
  getHasher(config.hashB)

  return config
}

/**
 * Constructor options for a resolved configuration
 */
export function toSetOptions(config: LexiBloomConfig): ProbabilisticSetOptions {
  return {
    size: config.size,
    k: config.k,
    expectedItems: config.expectedItems,
    hashA: getHasher(config.hashA),
    hashB: getHasher(config.hashB),
  }
}

/**
 * Install the console logger when `debug` is set, the noop logger otherwise
 */
export function applyLogging(config: Pick<LexiBloomConfig, 'debug'>): void {
  setLogger(config.debug ? consoleLogger : noopLogger)
}
