import { describe, it, expect, beforeEach } from 'vitest'
import { dumpImage, ingestImage, loadSnapshot, openImage, saveSnapshot } from '../../src/persist'
import { ProbabilisticSet } from '../../src/filter/ProbabilisticSet'
import { fnv1a32, fnv1a64 } from '../../src/hash/fnv1a'
import { MemoryBackend } from '../../src/storage/MemoryBackend'
import { FileNotFoundError, ImageLengthMismatchError, SerializationError } from '../../src/errors'

const OPTIONS = { size: 256, k: 5, hashA: fnv1a32, hashB: fnv1a64 }

describe('persist', () => {
  let backend: MemoryBackend
  let set: ProbabilisticSet

  beforeEach(() => {
    backend = new MemoryBackend()
    set = new ProbabilisticSet(OPTIONS)
    set.insertAll(['thistle', 'clover', 'heather'])
  })

  describe('snapshots', () => {
    it('round-trips through a backend', async () => {
      const result = await saveSnapshot(backend, 'sets/flowers.lxbf', set)
      expect(result.size).toBe(35 + 32)

      const restored = await loadSnapshot(backend, 'sets/flowers.lxbf')
      expect(restored.k).toBe(5)
      expect(restored.size).toBe(256)
      expect(restored.serialize()).toEqual(set.serialize())
    })

    it('reports a missing snapshot', async () => {
      await expect(loadSnapshot(backend, 'none.lxbf')).rejects.toThrow(FileNotFoundError)
    })

    it('rejects bytes that are not a snapshot', async () => {
      await backend.write('bare.bin', set.serialize())
      await expect(loadSnapshot(backend, 'bare.bin')).rejects.toThrow(SerializationError)
    })
  })

  describe('bare images', () => {
    it('writes exactly the serialized bits', async () => {
      const result = await dumpImage(backend, 'flowers.bits', set)
      expect(result.size).toBe(32)
      expect(await backend.read('flowers.bits')).toEqual(set.serialize())
    })

    it('opens an image with known parameters', async () => {
      await dumpImage(backend, 'flowers.bits', set)
      const opened = await openImage(backend, 'flowers.bits', OPTIONS)
      expect(opened.contains('clover')).toBe(true)
      expect(opened.serialize()).toEqual(set.serialize())
    })

    it('ingests an image into an existing set', async () => {
      await dumpImage(backend, 'flowers.bits', set)
      const target = new ProbabilisticSet(OPTIONS)
      await ingestImage(backend, 'flowers.bits', target)
      expect(target.contains('heather')).toBe(true)
    })

    it('rejects an image of the wrong length', async () => {
      await dumpImage(backend, 'flowers.bits', set)
      const bigger = new ProbabilisticSet({ ...OPTIONS, size: 512 })
      await expect(ingestImage(backend, 'flowers.bits', bigger)).rejects.toThrow(ImageLengthMismatchError)
    })
  })
})
