/**
 * lexibloom Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Word-list preset
// =============================================================================

/**
 * Bit count of the word-list preset (2^22 bits = 512 KiB image)
 */
export const WORD_SET_SIZE = 2 ** 22

/**
 * Probe count of the word-list preset
 */
export const WORD_SET_PROBES = 12

/**
 * Hash pair of the word-list preset
 */
export const WORD_SET_HASH_A = 'fnv1a-32'
export const WORD_SET_HASH_B = 'fnv1a-64'

/**
 * Largest bit image a set may allocate, in bytes (the Uint8Array length
 * limit of Node.js 20)
 */
export const MAX_IMAGE_BYTES = 2 ** 32

// =============================================================================
// Scoring
// =============================================================================

/**
 * Added inside the logarithm of match strength so a full match stays finite
 */
export const MATCH_STRENGTH_EPSILON = 1e-10

// =============================================================================
// Snapshot format
// =============================================================================

/**
 * Magic bytes opening every snapshot ("LXBF")
 */
export const SNAPSHOT_MAGIC = new Uint8Array([0x4c, 0x58, 0x42, 0x46])

/**
 * Current snapshot format version
 */
export const SNAPSHOT_VERSION = 1

/**
 * Longest hash function name a snapshot can record (one length byte)
 */
export const MAX_HASHER_NAME_BYTES = 255
