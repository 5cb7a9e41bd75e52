/**
 * Score Command
 *
 * Log-scaled match strength of a group of words against a snapshot.
 *
 * Usage:
 *   lexibloom score <snapshot> <word...>
 */

import type { ParsedArgs } from '../types'
import { backendFor, fail, print, printError, printJson } from '../types'
import { matchStrength } from '../../corpus'
import { loadSnapshot } from '../../persist'

export async function scoreCommand(parsed: ParsedArgs): Promise<number> {
  const [snapshotPath, ...words] = parsed.args
  if (!snapshotPath || words.length === 0) {
    printError('Missing snapshot or words')
    print('Usage: lexibloom score <snapshot> <word...>')
    return 1
  }

  try {
    const set = await loadSnapshot(backendFor(parsed), snapshotPath)
    const matched = words.filter((word) => set.contains(word)).length
    printJson(
      { words: words.length, matched, matchStrength: matchStrength(set, words) },
      parsed.options.pretty
    )
    return 0
  } catch (error: unknown) {
    return fail(error)
  }
}
