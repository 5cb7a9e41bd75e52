/**
 * Word-list corpus helpers
 *
 * Builds the word-list preset set (2^22 bits, 12 probes, FNV-1a 32/64)
 * from newline-separated word lists and scores candidate words against it.
 *
 * @module corpus
 */

import type { StorageBackend } from '../storage/types'
import { ProbabilisticSet } from '../filter/ProbabilisticSet'
import type { ProbabilisticSetOptions } from '../filter/ProbabilisticSet'
import { fnv1a32, fnv1a64 } from '../hash/fnv1a'
import { MATCH_STRENGTH_EPSILON, WORD_SET_PROBES, WORD_SET_SIZE } from '../constants'
import { logger } from '../utils/logger'

const decoder = new TextDecoder()

/**
 * Split a word list into trimmed, non-empty lines
 */
export function parseWordList(text: string): string[] {
  const words: string[] = []
  for (const line of text.split(/\r?\n/)) {
    const word = line.trim()
    if (word) {
      words.push(word)
    }
  }
  return words
}

/**
 * Read and parse a UTF-8 word list from a backend
 */
export async function loadWordList(backend: StorageBackend, path: string): Promise<string[]> {
  const words = parseWordList(decoder.decode(await backend.read(path)))
  logger.debug(`Loaded ${words.length} words from ${path}`)
  return words
}

/**
 * Options of the word-list preset
 */
export function wordSetOptions(overrides: Partial<ProbabilisticSetOptions> = {}): ProbabilisticSetOptions {
  const options: ProbabilisticSetOptions = {
    size: overrides.size ?? WORD_SET_SIZE,
    hashA: overrides.hashA ?? fnv1a32,
    hashB: overrides.hashB ?? fnv1a64,
  }
  if (overrides.k !== undefined) {
    options.k = overrides.k
  } else if (overrides.expectedItems !== undefined) {
    options.expectedItems = overrides.expectedItems
  } else {
    options.k = WORD_SET_PROBES
  }
  return options
}

/**
 * Create a word-list preset set holding `words`
 */
export function createWordSet(
  words: Iterable<string>,
  overrides: Partial<ProbabilisticSetOptions> = {}
): ProbabilisticSet {
  const set = new ProbabilisticSet(wordSetOptions(overrides))
  set.insertAll(words)
  return set
}

/**
 * Mean log-scaled confidence of `words` against `set`:
 *
 *   mean(-ln(1 - confidence(w) + 1e-10))
 *
 * A full match contributes about 23.03, a half match about 0.69, so a few
 * exact hits outweigh many partial ones. Returns 0 for an empty list.
 */
export function matchStrength(set: ProbabilisticSet, words: readonly string[]): number {
  if (words.length === 0) {
    return 0
  }
  let total = 0
  for (const word of words) {
    total += -Math.log(1 - set.confidence(word) + MATCH_STRENGTH_EPSILON)
  }
  return total / words.length
}
