import { describe, it, expect } from 'vitest'
import {
  createWordSet,
  loadWordList,
  matchStrength,
  parseWordList,
  wordSetOptions,
} from '../../src/corpus'
import { ProbabilisticSet } from '../../src/filter/ProbabilisticSet'
import { fnv1a32, fnv1a64, fnv1a128 } from '../../src/hash/fnv1a'
import { MemoryBackend } from '../../src/storage/MemoryBackend'
import { FileNotFoundError } from '../../src/errors'
import { fixedHasher, imageWithBits } from '../helpers/hashers'

const FULL_MATCH = -Math.log(1e-10)

describe('parseWordList', () => {
  it('trims lines and drops blanks', () => {
    expect(parseWordList(' apple\r\nbanana\n\n   \ncherry \n')).toEqual(['apple', 'banana', 'cherry'])
  })

  it('returns nothing for empty text', () => {
    expect(parseWordList('')).toEqual([])
  })

  it('keeps duplicates', () => {
    expect(parseWordList('kiwi\nkiwi')).toEqual(['kiwi', 'kiwi'])
  })
})

describe('loadWordList', () => {
  it('decodes UTF-8 from the backend', async () => {
    const backend = new MemoryBackend()
    await backend.write('lists/fruit.txt', new TextEncoder().encode('pear\ncafé\n'))
    expect(await loadWordList(backend, 'lists/fruit.txt')).toEqual(['pear', 'café'])
  })

  it('propagates a missing file', async () => {
    await expect(loadWordList(new MemoryBackend(), 'nope.txt')).rejects.toThrow(FileNotFoundError)
  })
})

describe('wordSetOptions', () => {
  it('defaults to 2^22 bits, 12 probes and FNV-1a 32/64', () => {
    expect(wordSetOptions()).toEqual({ size: 4_194_304, k: 12, hashA: fnv1a32, hashB: fnv1a64 })
  })

  it('uses an expected item count instead of the preset k', () => {
    const options = wordSetOptions({ size: 1024, expectedItems: 100 })
    expect(options.k).toBeUndefined()
    expect(new ProbabilisticSet(options).k).toBe(7)
  })

  it('keeps overridden hashers', () => {
    expect(wordSetOptions({ hashB: fnv1a128 }).hashB).toBe(fnv1a128)
  })
})

describe('createWordSet', () => {
  it('holds every word it was built from', () => {
    const words = ['oak', 'ash', 'elm', 'yew']
    const set = createWordSet(words, { size: 4096 })
    expect(set.k).toBe(12)
    for (const word of words) {
      expect(set.contains(word)).toBe(true)
    }
  })
})

describe('matchStrength', () => {
  const halfSet = (): ProbabilisticSet =>
    ProbabilisticSet.fromImage(imageWithBits(16, [0]), {
      size: 16,
      k: 2,
      hashA: fixedHasher('a', { half: 0, miss: 8 }),
      hashB: fixedHasher('b', { half: 1, miss: 1 }),
    })

  it('is 0 for an empty word list', () => {
    expect(matchStrength(createWordSet([], { size: 64 }), [])).toBe(0)
  })

  it('scores a full match as -ln(1e-10)', () => {
    const set = createWordSet(['linden'], { size: 4096 })
    expect(matchStrength(set, ['linden'])).toBeCloseTo(FULL_MATCH, 6)
  })

  it('scores a half match near ln 2', () => {
    const set = halfSet()
    expect(set.confidence('half')).toBe(0.5)
    expect(matchStrength(set, ['half'])).toBeCloseTo(Math.LN2, 6)
  })

  it('averages over the words', () => {
    const set = halfSet()
    expect(set.confidence('miss')).toBe(0)
    expect(matchStrength(set, ['half', 'miss'])).toBeCloseTo(Math.LN2 / 2, 6)
  })

  it('lets one exact hit outweigh many partial ones', () => {
    const set = createWordSet(['alder'], { size: 4096 })
    const hit = matchStrength(set, ['alder', 'zz1', 'zz2', 'zz3'])
    expect(hit).toBeGreaterThan(FULL_MATCH / 4 - 1)
  })
})
