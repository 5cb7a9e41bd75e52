/**
 * CLI Types and Utilities
 *
 * Shared types and output helpers for the lexibloom CLI. Commands and the
 * entry point import from here so neither depends on the other.
 */

import { FsBackend } from '../storage/FsBackend'
import { isLexiBloomError } from '../errors'

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    directory: string
    size?: number | undefined
    k?: number | undefined
    expectedItems?: number | undefined
    pretty: boolean
    quiet: boolean
    verbose: boolean
  }
}

/**
 * A command resolves to its process exit code
 */
export type Command = (parsed: ParsedArgs) => Promise<number>

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write(`Error: ${message}\n`)
}

/**
 * Print a value as JSON (one line unless `pretty`)
 */
export function printJson(value: unknown, pretty: boolean): void {
  print(pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value))
}

/**
 * Report a failed command and return its exit code
 */
export function fail(error: unknown): number {
  if (isLexiBloomError(error)) {
    printError(`${error.message} [${error.code}]`)
  } else if (error instanceof Error) {
    printError(error.message)
  } else {
    printError(String(error))
  }
  return 1
}

/**
 * Backend rooted at the working directory of the invocation
 */
export function backendFor(parsed: ParsedArgs): FsBackend {
  return new FsBackend(parsed.options.directory)
}
