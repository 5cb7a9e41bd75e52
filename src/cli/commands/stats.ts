/**
 * Stats Command
 *
 * Show parameters and fill estimates of a snapshot.
 *
 * Usage:
 *   lexibloom stats <snapshot>
 *
 * Shows:
 *   - size, k and hash names
 *   - set bits and fill ratio
 *   - estimated item count and false-positive rate
 */

import type { ParsedArgs } from '../types'
import { backendFor, fail, print, printError, printJson } from '../types'
import { loadSnapshot } from '../../persist'

export async function statsCommand(parsed: ParsedArgs): Promise<number> {
  const snapshotPath = parsed.args[0]
  if (!snapshotPath) {
    printError('Missing snapshot path')
    print('Usage: lexibloom stats <snapshot>')
    return 1
  }

  try {
    const set = await loadSnapshot(backendFor(parsed), snapshotPath)
    const stats = set.stats()
    printJson(
      {
        ...stats,
        estimatedItems: Number.isFinite(stats.estimatedItems) ? Math.round(stats.estimatedItems) : null,
        hashA: set.hashA.name,
        hashB: set.hashB.name,
        bytes: set.byteLength,
      },
      parsed.options.pretty
    )
    return 0
  } catch (error: unknown) {
    return fail(error)
  }
}
