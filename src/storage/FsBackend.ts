/**
 * FsBackend - Node.js filesystem implementation of StorageBackend
 *
 * Uses node:fs/promises with:
 * - Atomic writes (write to a temp file, then rename)
 * - Path traversal prevention; every path stays under the root directory
 */

import { promises as fs } from 'node:fs'
import { dirname, normalize, resolve, sep } from 'node:path'
import { randomBytes } from 'node:crypto'
import { logger } from '../utils/logger'
import type { StorageBackend, WriteOptions, WriteResult } from './types'
import { AlreadyExistsError, FileNotFoundError, PathTraversalError } from '../errors'
import { generateEtag, normalizePath } from './utils'

function isErrnoCode(error: unknown, code: string): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === code
}

/**
 * Node.js filesystem storage backend
 */
export class FsBackend implements StorageBackend {
  readonly type = 'fs'
  private readonly resolvedRootPath: string

  /**
   * @param rootPath - The root directory for all operations
   */
  constructor(public readonly rootPath: string) {
    this.resolvedRootPath = resolve(rootPath)
  }

  /**
   * Resolve and validate a path, preventing path traversal
   */
  private resolvePath(path: string): string {
    if (path.includes('\x00') || path.includes('..')) {
      throw new PathTraversalError(path)
    }

    const fullPath = resolve(this.resolvedRootPath, normalize(normalizePath(path)))

    if (!fullPath.startsWith(this.resolvedRootPath + sep) && fullPath !== this.resolvedRootPath) {
      throw new PathTraversalError(path)
    }

    return fullPath
  }

  private async assertAbsent(path: string, fullPath: string): Promise<void> {
    try {
      await fs.access(fullPath)
    } catch (error: unknown) {
      if (isErrnoCode(error, 'ENOENT')) {
        return
      }
      throw error
    }
    throw new AlreadyExistsError(path)
  }

  async read(path: string): Promise<Uint8Array> {
    const fullPath = this.resolvePath(path)
    try {
      const buffer = await fs.readFile(fullPath)
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
    } catch (error: unknown) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new FileNotFoundError(path, error instanceof Error ? error : undefined)
      }
      throw error
    }
  }

  async exists(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(path)
    try {
      await fs.access(fullPath)
      return true
    } catch (error: unknown) {
      if (isErrnoCode(error, 'ENOENT')) {
        return false
      }
      throw error
    }
  }

  async write(path: string, data: Uint8Array, options?: WriteOptions): Promise<WriteResult> {
    const fullPath = this.resolvePath(path)

    if (options?.ifNoneMatch === '*') {
      await this.assertAbsent(path, fullPath)
    }

    await fs.mkdir(dirname(fullPath), { recursive: true })
    await fs.writeFile(fullPath, data)

    return {
      etag: generateEtag(data),
      size: data.length,
    }
  }

  async writeAtomic(path: string, data: Uint8Array, options?: WriteOptions): Promise<WriteResult> {
    const fullPath = this.resolvePath(path)
    const tempPath = `${fullPath}.tmp.${Date.now()}.${randomBytes(5).toString('hex')}`

    if (options?.ifNoneMatch === '*') {
      await this.assertAbsent(path, fullPath)
    }

    await fs.mkdir(dirname(fullPath), { recursive: true })

    try {
      await fs.writeFile(tempPath, data)
      await fs.rename(tempPath, fullPath)
    } catch (error: unknown) {
      try {
        await fs.unlink(tempPath)
      } catch (cleanupError) {
        // temp file may never have been created
        logger.debug(`Failed to clean up temp file ${tempPath} during writeAtomic`, cleanupError)
      }
      throw error
    }

    return {
      etag: generateEtag(data),
      size: data.length,
    }
  }

  async delete(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(path)
    try {
      const stat = await fs.stat(fullPath)
      if (stat.isDirectory()) {
        return false
      }
      await fs.unlink(fullPath)
      return true
    } catch (error: unknown) {
      if (isErrnoCode(error, 'ENOENT')) {
        return false
      }
      throw error
    }
  }
}
