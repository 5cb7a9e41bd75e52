/**
 * Check Command
 *
 * Report membership and confidence of words against a snapshot.
 *
 * Usage:
 *   lexibloom check <snapshot> <word...>
 *
 * Prints one JSON object per word: { word, contains, confidence }
 */

import type { ParsedArgs } from '../types'
import { backendFor, fail, print, printError, printJson } from '../types'
import { loadSnapshot } from '../../persist'

export async function checkCommand(parsed: ParsedArgs): Promise<number> {
  const [snapshotPath, ...words] = parsed.args
  if (!snapshotPath || words.length === 0) {
    printError('Missing snapshot or words')
    print('Usage: lexibloom check <snapshot> <word...>')
    return 1
  }

  try {
    const set = await loadSnapshot(backendFor(parsed), snapshotPath)
    for (const word of words) {
      printJson(
        { word, contains: set.contains(word), confidence: set.confidence(word) },
        parsed.options.pretty
      )
    }
    return 0
  } catch (error: unknown) {
    return fail(error)
  }
}
