/**
 * Storage backend interface for lexibloom
 * Abstracts where snapshots, images and word lists are kept
 */

/**
 * Options for write operations
 */
export interface WriteOptions {
  /** Only write if the file does not exist ('*') */
  ifNoneMatch?: '*' | undefined
}

/**
 * Result of a write operation
 */
export interface WriteResult {
  /** Content tag of the written file */
  etag: string
  /** Bytes written */
  size: number
}

/**
 * Storage backend interface
 * Implementations: FsBackend, MemoryBackend
 */
export interface StorageBackend {
  /** Backend type identifier */
  readonly type: string

  /**
   * Read entire file
   *
   * @throws FileNotFoundError if the file does not exist
   */
  read(path: string): Promise<Uint8Array>

  /**
   * Check if file exists
   */
  exists(path: string): Promise<boolean>

  /**
   * Write file (overwrite if exists)
   *
   * @throws AlreadyExistsError with `ifNoneMatch: '*'` when the file exists
   */
  write(path: string, data: Uint8Array, options?: WriteOptions): Promise<WriteResult>

  /**
   * Write file so readers never observe a partial image
   */
  writeAtomic(path: string, data: Uint8Array, options?: WriteOptions): Promise<WriteResult>

  /**
   * Delete file
   *
   * @returns true if a file was removed
   */
  delete(path: string): Promise<boolean>
}
