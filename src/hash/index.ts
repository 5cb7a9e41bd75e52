export type { StringHasher } from './types'
export type { FnvParams } from './fnv1a'
export {
  fnv1a32,
  fnv1a64,
  fnv1a128,
  fnv1a256,
  fnv1a32Bytes,
  fnv1aBytes,
  FNV_32,
  FNV_64,
  FNV_128,
  FNV_256,
} from './fnv1a'
export { getHasher, listHashers, createHasher } from './registry'
