/**
 * MemoryBackend - In-memory implementation of StorageBackend
 *
 * Used for tests and for callers that keep snapshots in process.
 */

import type { StorageBackend, WriteOptions, WriteResult } from './types'
import { generateEtag, normalizePath } from './utils'
import { AlreadyExistsError, FileNotFoundError } from '../errors'

/**
 * In-memory storage backend
 */
export class MemoryBackend implements StorageBackend {
  readonly type = 'memory'

  private files = new Map<string, Uint8Array>()

  async read(path: string): Promise<Uint8Array> {
    path = normalizePath(path)
    const data = this.files.get(path)
    if (!data) {
      throw new FileNotFoundError(path)
    }
    // Return a copy to prevent external mutation
    return new Uint8Array(data)
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(normalizePath(path))
  }

  async write(path: string, data: Uint8Array, options: WriteOptions = {}): Promise<WriteResult> {
    path = normalizePath(path)

    if (options.ifNoneMatch === '*' && this.files.has(path)) {
      throw new AlreadyExistsError(path)
    }

    this.files.set(path, new Uint8Array(data))
    return {
      etag: generateEtag(data),
      size: data.length,
    }
  }

  /**
   * In memory every write is already atomic
   */
  async writeAtomic(path: string, data: Uint8Array, options: WriteOptions = {}): Promise<WriteResult> {
    return this.write(path, data, options)
  }

  async delete(path: string): Promise<boolean> {
    return this.files.delete(normalizePath(path))
  }

  /**
   * Paths currently stored, sorted
   */
  paths(): string[] {
    return [...this.files.keys()].sort()
  }

  clear(): void {
    this.files.clear()
  }
}
