/**
 * CLI Argument Parser
 *
 * Pure function for parsing command line arguments; no I/O.
 */

import type { ParsedArgs } from './types'

function parsePositiveInt(flag: string, raw: string | undefined): number {
  const value = Number(raw)
  if (raw === undefined || raw.trim() === '' || !Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`Invalid value for ${flag}: ${raw ?? '(missing)'}`)
  }
  return value
}

/**
 * Parse command line arguments
 *
 * @param argv - Arguments after the executable and script path
 * @param cwd - Default working directory
 */
export function parseArgs(argv: string[], cwd: string = process.cwd()): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      directory: cwd,
      pretty: false,
      quiet: false,
      verbose: false,
    },
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    if (arg.startsWith('-')) {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '-d':
        case '--directory':
          result.options.directory = argv[++i] ?? cwd
          break
        case '-s':
        case '--size':
          result.options.size = parsePositiveInt(arg, argv[++i])
          break
        case '-k':
        case '--hashes':
          result.options.k = parsePositiveInt(arg, argv[++i])
          break
        case '-n':
        case '--expected':
          result.options.expectedItems = parsePositiveInt(arg, argv[++i])
          break
        case '-p':
        case '--pretty':
          result.options.pretty = true
          break
        case '-q':
        case '--quiet':
          result.options.quiet = true
          break
        case '--verbose':
          result.options.verbose = true
          break
        default:
          throw new Error(`Unknown option: ${arg}`)
      }
    } else if (!result.command) {
      // First non-option is the command
      result.command = arg
    } else {
      result.args.push(arg)
    }
    i++
  }

  return result
}
