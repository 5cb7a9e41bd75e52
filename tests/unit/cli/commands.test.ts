/**
 * CLI Command Tests
 *
 * Runs the commands through `main` against a temp directory and captures
 * stdout and stderr.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import { main, HELP_TEXT, VERSION } from '../../../src/cli/index'
import { createTestContext } from '../../helpers/temp-dir'
import type { TestContext } from '../../helpers/temp-dir'

describe('lexibloom CLI', () => {
  let ctx: TestContext
  let stdoutOutput: string[] = []
  let stderrOutput: string[] = []
  const originalStdoutWrite = process.stdout.write
  const originalStderrWrite = process.stderr.write

  beforeEach(async () => {
    ctx = await createTestContext('lexibloom-cli-test-')
    await fs.writeFile(join(ctx.tempDir, 'words.txt'), 'apple\nbanana\n\ncherry\n')

    stdoutOutput = []
    stderrOutput = []

    process.stdout.write = vi.fn((chunk: string | Uint8Array) => {
      stdoutOutput.push(chunk.toString())
      return true
    })
    process.stderr.write = vi.fn((chunk: string | Uint8Array) => {
      stderrOutput.push(chunk.toString())
      return true
    })
  })

  afterEach(async () => {
    process.stdout.write = originalStdoutWrite
    process.stderr.write = originalStderrWrite
    await ctx.cleanup()
  })

  function run(...argv: string[]): Promise<number> {
    return main([...argv, '-d', ctx.tempDir])
  }

  async function build(): Promise<void> {
    expect(await run('build', 'words.txt', 'words.lxbf', '-s', '4096', '-k', '5', '-q')).toBe(0)
    stdoutOutput = []
  }

  // ===========================================================================
  // Top level
  // ===========================================================================

  describe('main', () => {
    it('prints help without a command', async () => {
      expect(await main([])).toBe(0)
      expect(stdoutOutput).toEqual([HELP_TEXT + '\n'])
    })

    it('prints the version', async () => {
      expect(await main(['-v'])).toBe(0)
      expect(stdoutOutput).toEqual([`lexibloom v${VERSION}\n`])
    })

    it('rejects unknown commands', async () => {
      expect(await main(['frob'])).toBe(1)
      expect(stderrOutput).toEqual(['Error: Unknown command: frob\n'])
    })

    it('reports bad options', async () => {
      expect(await main(['build', '-s', 'abc'])).toBe(1)
      expect(stderrOutput).toEqual(['Error: Invalid value for -s: abc\n'])
    })
  })

  // ===========================================================================
  // build
  // ===========================================================================

  describe('build', () => {
    it('writes a snapshot and prints a summary', async () => {
      expect(await run('build', 'words.txt', 'words.lxbf', '-s', '4096', '-k', '5')).toBe(0)

      expect(JSON.parse(stdoutOutput.join(''))).toMatchObject({ output: 'words.lxbf', words: 3, bytes: 547, size: 4096, k: 5 })

      const stored = await fs.stat(join(ctx.tempDir, 'words.lxbf'))
      expect(stored.size).toBe(547)
    })

    it('prints nothing with --quiet', async () => {
      await build()
      expect(stdoutOutput).toEqual([])
    })

    it('takes the bit count from the environment', async () => {
      process.env.LEXIBLOOM_SIZE = '2048'
      expect(await run('build', 'words.txt', 'env.lxbf', '-k', '3')).toBe(0)
      expect(JSON.parse(stdoutOutput.join(''))).toMatchObject({ size: 2048, k: 3, bytes: 35 + 256 })
    })

    it('derives k from --expected', async () => {
      expect(await run('build', 'words.txt', 'n.lxbf', '-s', '1024', '-n', '100')).toBe(0)
      expect(JSON.parse(stdoutOutput.join(''))).toMatchObject({ k: 7 })
    })

    it('derives k from the size alone', async () => {
      expect(await run('build', 'words.txt', 'sized.lxbf', '-s', '1024')).toBe(0)
      expect(JSON.parse(stdoutOutput.join(''))).toMatchObject({ size: 1024, k: 10 })
    })

    it('uses the preset without options', async () => {
      expect(await run('build', 'words.txt', 'preset.lxbf')).toBe(0)
      expect(JSON.parse(stdoutOutput.join(''))).toMatchObject({ size: 4_194_304, k: 12 })
    })

    it('needs both paths', async () => {
      expect(await run('build', 'words.txt')).toBe(1)
      expect(stderrOutput).toEqual(['Error: Missing arguments\n'])
    })

    it('reports a missing word list', async () => {
      expect(await run('build', 'absent.txt', 'out.lxbf')).toBe(1)
      expect(stderrOutput).toEqual(['Error: File not found: absent.txt [FILE_NOT_FOUND]\n'])
    })

    it('refuses paths outside the directory', async () => {
      expect(await run('build', '../words.txt', 'out.lxbf')).toBe(1)
      expect(stderrOutput).toEqual(['Error: Path traversal attempt detected: ../words.txt [PATH_TRAVERSAL]\n'])
    })
  })

  // ===========================================================================
  // check / score / stats
  // ===========================================================================

  describe('check', () => {
    it('prints one line per word', async () => {
      await build()
      expect(await run('check', 'words.lxbf', 'apple', 'cherry')).toBe(0)
      expect(stdoutOutput).toEqual([
        '{"word":"apple","contains":true,"confidence":1}\n',
        '{"word":"cherry","contains":true,"confidence":1}\n',
      ])
    })

    it('needs at least one word', async () => {
      await build()
      expect(await run('check', 'words.lxbf')).toBe(1)
      expect(stderrOutput).toEqual(['Error: Missing snapshot or words\n'])
    })

    it('reports a missing snapshot', async () => {
      expect(await run('check', 'missing.lxbf', 'apple')).toBe(1)
      expect(stderrOutput).toEqual(['Error: File not found: missing.lxbf [FILE_NOT_FOUND]\n'])
    })

    it('reports a file that is not a snapshot', async () => {
      expect(await run('check', 'words.txt', 'apple')).toBe(1)
      expect(stderrOutput).toEqual(['Error: Not a lexibloom snapshot (bad magic) [INVALID_SNAPSHOT]\n'])
    })
  })

  describe('score', () => {
    it('prints the match strength of the words', async () => {
      await build()
      expect(await run('score', 'words.lxbf', 'apple', 'banana')).toBe(0)

      expect(JSON.parse(stdoutOutput.join(''))).toEqual({
        words: 2,
        matched: 2,
        matchStrength: expect.closeTo(-Math.log(1e-10), 6),
      })
    })
  })

  describe('stats', () => {
    it('prints parameters and hash names', async () => {
      await build()
      expect(await run('stats', 'words.lxbf')).toBe(0)
      expect(JSON.parse(stdoutOutput.join(''))).toMatchObject({
        size: 4096,
        k: 5,
        hashA: 'fnv1a-32',
        hashB: 'fnv1a-64',
        bytes: 512,
      })
    })

    it('pretty prints with -p', async () => {
      await build()
      expect(await run('stats', 'words.lxbf', '-p')).toBe(0)
      expect(stdoutOutput.join('')).toContain('\n  "size": 4096,\n')
    })

    it('needs a snapshot path', async () => {
      expect(await run('stats')).toBe(1)
      expect(stderrOutput).toEqual(['Error: Missing snapshot path\n'])
    })
  })
})
