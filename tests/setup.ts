/**
 * Vitest Test Setup
 *
 * Loaded before every test file. Keeps the global logger and LEXIBLOOM_*
 * environment variables from leaking between tests.
 */

import { afterEach, beforeEach } from 'vitest'
import { noopLogger, setLogger } from '../src/utils/logger'

const ENV_PREFIX = 'LEXIBLOOM_'

function clearLexiBloomEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith(ENV_PREFIX)) {
      delete process.env[key]
    }
  }
}

beforeEach(() => {
  clearLexiBloomEnv()
})

afterEach(() => {
  setLogger(noopLogger)
  clearLexiBloomEnv()
})
