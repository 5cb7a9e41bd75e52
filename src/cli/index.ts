#!/usr/bin/env node
/**
 * lexibloom CLI
 *
 * Build word-list snapshots and query them from the command line.
 *
 * Usage:
 *   lexibloom build <wordlist> <output>
 *   lexibloom check <snapshot> <word...>
 *   lexibloom score <snapshot> <word...>
 *   lexibloom stats <snapshot>
 */

import { parseArgs } from './args'
import { print, printError } from './types'
import type { Command, ParsedArgs } from './types'
import { buildCommand } from './commands/build'
import { checkCommand } from './commands/check'
import { scoreCommand } from './commands/score'
import { statsCommand } from './commands/stats'
import { applyLogging, configFromEnv } from '../config'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

export const HELP_TEXT = `
lexibloom v${VERSION}

Probabilistic word-list membership from the command line.

USAGE:
  lexibloom <command> [options]

COMMANDS:
  build <wordlist> <output>     Build a snapshot from a word list (one word per line)
  check <snapshot> <word...>    Show membership and confidence for each word
  score <snapshot> <word...>    Show the log-scaled match strength of the words
  stats <snapshot>              Show parameters and fill estimates

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  -d, --directory <path>        Directory paths are resolved against (default: cwd)
  -s, --size <bits>             Bit count for build (default: 4194304)
  -k, --hashes <k>              Probe count for build (default: 12)
  -n, --expected <n>            Derive the probe count from an expected word count
  -p, --pretty                  Pretty print JSON output
  -q, --quiet                   Suppress build summary
      --verbose                 Log debug output to the console

EXAMPLES:
  lexibloom build words.txt words.lxbf
  lexibloom check words.lxbf apple qzxv
  lexibloom score words.lxbf the quick brown fox
`

const COMMANDS: Record<string, Command> = {
  build: buildCommand,
  check: checkCommand,
  score: scoreCommand,
  stats: statsCommand,
}

export type { ParsedArgs }

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const parsed = parseArgs(argv)

    applyLogging({ debug: parsed.options.verbose || (configFromEnv().debug ?? false) })

    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    if (parsed.options.version) {
      print(`lexibloom v${VERSION}`)
      return 0
    }

    if (!parsed.command || parsed.command === 'help') {
      print(HELP_TEXT)
      return 0
    }

    const command = COMMANDS[parsed.command]
    if (!command) {
      printError(`Unknown command: ${parsed.command}`)
      print('\nRun "lexibloom --help" for usage.')
      return 1
    }
    return await command(parsed)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}

if (process.argv[1]?.endsWith('/cli/index.js') || process.argv[1]?.endsWith('/lexibloom')) {
  main().then((code) => process.exit(code))
}
