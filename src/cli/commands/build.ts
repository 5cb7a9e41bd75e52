/**
 * Build Command
 *
 * Build a snapshot from a newline-separated word list.
 *
 * Usage:
 *   lexibloom build <wordlist> <output> [-s bits] [-k probes | -n expected]
 */

import type { ParsedArgs } from '../types'
import { backendFor, fail, print, printError, printJson } from '../types'
import { resolveConfig, toSetOptions } from '../../config'
import { loadWordList } from '../../corpus'
import { ProbabilisticSet } from '../../filter/ProbabilisticSet'
import { saveSnapshot } from '../../persist'

export async function buildCommand(parsed: ParsedArgs): Promise<number> {
  const [wordListPath, outputPath] = parsed.args
  if (!wordListPath || !outputPath) {
    printError('Missing arguments')
    print('Usage: lexibloom build <wordlist> <output>')
    return 1
  }

  try {
    const config = resolveConfig({
      size: parsed.options.size,
      k: parsed.options.k,
      expectedItems: parsed.options.expectedItems,
    })
    const backend = backendFor(parsed)
    const words = await loadWordList(backend, wordListPath)

    const set = new ProbabilisticSet(toSetOptions(config))
    set.insertAll(words)
    const written = await saveSnapshot(backend, outputPath, set)

    if (!parsed.options.quiet) {
      const stats = set.stats()
      printJson(
        {
          output: outputPath,
          words: words.length,
          bytes: written.size,
          size: stats.size,
          k: stats.k,
          setBits: stats.setBits,
          fillRatio: stats.fillRatio,
        },
        parsed.options.pretty
      )
    }
    return 0
  } catch (error: unknown) {
    return fail(error)
  }
}
