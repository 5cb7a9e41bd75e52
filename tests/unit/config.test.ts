import { describe, it, expect } from 'vitest'
import {
  DEFAULT_CONFIG,
  applyLogging,
  configFromEnv,
  defineConfig,
  resolveConfig,
  toSetOptions,
} from '../../src/config'
import { ProbabilisticSet } from '../../src/filter/ProbabilisticSet'
import { fnv1a128, fnv1a32, fnv1a64 } from '../../src/hash/fnv1a'
import { ConfigurationError, UnknownHasherError } from '../../src/errors'
import * as log from '../../src/utils/logger'

describe('configFromEnv', () => {
  it('returns nothing for an empty environment', () => {
    expect(configFromEnv({})).toEqual({})
  })

  it('reads every LEXIBLOOM_* variable', () => {
    expect(
      configFromEnv({
        LEXIBLOOM_SIZE: '2048',
        LEXIBLOOM_K: '6',
        LEXIBLOOM_EXPECTED_ITEMS: '300',
        LEXIBLOOM_HASH_A: ' fnv1a-128 ',
        LEXIBLOOM_HASH_B: 'fnv1a-256',
        LEXIBLOOM_DEBUG: 'yes',
      })
    ).toEqual({
      size: 2048,
      k: 6,
      expectedItems: 300,
      hashA: 'fnv1a-128',
      hashB: 'fnv1a-256',
      debug: true,
    })
  })

  it('ignores blank values', () => {
    expect(configFromEnv({ LEXIBLOOM_SIZE: ' ', LEXIBLOOM_HASH_A: '' })).toEqual({})
  })

  it.each(['abc', '0', '-5', '1.5', '1e400'])('rejects LEXIBLOOM_K=%j', (raw) => {
    expect(() => configFromEnv({ LEXIBLOOM_K: raw })).toThrow(
      `LEXIBLOOM_K must be a positive integer, got "${raw}"`
    )
  })

  it('parses boolean spellings', () => {
    expect(configFromEnv({ LEXIBLOOM_DEBUG: 'TRUE' }).debug).toBe(true)
    expect(configFromEnv({ LEXIBLOOM_DEBUG: '0' }).debug).toBe(false)
    expect(configFromEnv({ LEXIBLOOM_DEBUG: 'no' }).debug).toBe(false)
    expect(() => configFromEnv({ LEXIBLOOM_DEBUG: 'maybe' })).toThrow(ConfigurationError)
  })
})

describe('resolveConfig', () => {
  it('falls back to the word-list preset', () => {
    expect(resolveConfig({}, {})).toEqual({
      size: 4_194_304,
      k: 12,
      hashA: 'fnv1a-32',
      hashB: 'fnv1a-64',
      debug: false,
    })
  })

  it('lets the environment replace defaults', () => {
    const config = resolveConfig({}, { LEXIBLOOM_SIZE: '1024', LEXIBLOOM_EXPECTED_ITEMS: '100' })
    expect(config.size).toBe(1024)
    expect(config.expectedItems).toBe(100)
    expect(config.k).toBeUndefined()
    expect(new ProbabilisticSet(toSetOptions(config)).k).toBe(7)
  })

  it('lets overrides replace the environment', () => {
    const config = resolveConfig(
      { size: 512, k: 3 },
      { LEXIBLOOM_SIZE: '1024', LEXIBLOOM_EXPECTED_ITEMS: '100' }
    )
    expect(config.size).toBe(512)
    expect(config.k).toBe(3)
    expect(config.expectedItems).toBeUndefined()
  })

  it('derives k from a non-preset size when no count is given', () => {
    const config = resolveConfig({ size: 1024 }, {})
    expect(config.k).toBeUndefined()
    expect(config.expectedItems).toBeUndefined()
    expect(new ProbabilisticSet(toSetOptions(config)).k).toBe(10)
  })

  it('derives k from a size taken from the environment', () => {
    const config = resolveConfig({}, { LEXIBLOOM_SIZE: '65536' })
    expect(new ProbabilisticSet(toSetOptions(config)).k).toBe(16)
  })

  it('keeps the preset k when the preset size is named explicitly', () => {
    expect(resolveConfig({ size: 2 ** 22 }, {}).k).toBe(12)
  })

  it('skips undefined overrides', () => {
    const config = resolveConfig({ size: undefined, k: undefined }, { LEXIBLOOM_K: '4' })
    expect(config.size).toBe(DEFAULT_CONFIG.size)
    expect(config.k).toBe(4)
  })

  it('rejects an invalid size', () => {
    expect(() => resolveConfig({ size: 0 }, {})).toThrow(ConfigurationError)
  })

  it('rejects unknown hash names', () => {
    expect(() => resolveConfig({}, { LEXIBLOOM_HASH_A: 'crc32' })).toThrow(UnknownHasherError)
  })
})

describe('toSetOptions', () => {
  it('resolves hash names', () => {
    const options = toSetOptions(resolveConfig(defineConfig({ hashB: 'fnv1a-128' }), {}))
    expect(options.hashA).toBe(fnv1a32)
    expect(options.hashB).toBe(fnv1a128)
    expect(options.k).toBe(12)
  })

  it('builds the default set', () => {
    const set = new ProbabilisticSet(toSetOptions(resolveConfig({}, {})))
    expect(set.size).toBe(4_194_304)
    expect(set.hashB).toBe(fnv1a64)
  })
})

describe('applyLogging', () => {
  it('switches between console and noop loggers', () => {
    applyLogging({ debug: true })
    expect(log.logger).toBe(log.consoleLogger)

    applyLogging({ debug: false })
    expect(log.logger).toBe(log.noopLogger)
  })
})
