import { describe, it, expect, vi, afterEach } from 'vitest'
import { WorldGenerator } from '../world/generate/WorldGenerator.ts'
import { GenerationConfig } from '../world/generate/GenerationConfig.ts'
import { ChunkShape } from '../world/coordinates/CoordinateUtils.ts'
import { VoxelBuffer } from '../world/chunks/VoxelBuffer.ts'
import { VoxelIds } from '../world/blocks/VoxelIds.ts'
import { createChunkKey, type ChunkKey } from '../world/interfaces/ICoordinates.ts'

const SAND_ATTRIBUTE = 0.7

function sandSampler() {
  return vi.fn((_chunkKey: ChunkKey, _seed: number, shape: ChunkShape) =>
    new Float32Array(shape.area).fill(SAND_ATTRIBUTE)
  )
}

function flatGround(generator: WorldGenerator, groundY: number): VoxelBuffer {
  const voxels = generator.createBuffer()
  const { edge } = voxels.shape
  for (let z = 0; z < edge; z++) {
    for (let x = 0; x < edge; x++) {
      for (let y = 0; y <= groundY; y++) voxels.setAt(x, y, z, VoxelIds.STONE)
    }
  }
  return voxels
}

describe('WorldGenerator', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('applies biomes to every surface column and stores the chunk', () => {
    const sampler = sandSampler()
    const generator = new WorldGenerator({ seed: 7, chunkSize: 8 }, sampler)
    const key = createChunkKey(1, 0, 2)
    const voxels = flatGround(generator, 2)

    const result = generator.generate(key, voxels)

    expect(result).toBe(voxels)
    for (let z = 0; z < 8; z++) {
      for (let x = 0; x < 8; x++) {
        expect(voxels.getAt(x, 2, z)).toBe(VoxelIds.SAND)
        expect(voxels.getAt(x, 3, z)).toBe(VoxelIds.EMPTY)
      }
    }
    expect(sampler).toHaveBeenCalledWith(key, 7, voxels.shape)
    expect(generator.hasChunk(createChunkKey(1, 0, 2))).toBe(true)
    expect(generator.getChunk(createChunkKey(1, 0, 2))).toBe(voxels)
    expect(generator.getGeneratedCount()).toBe(1)
  })

  it('skips sampling for a chunk with no surface', () => {
    const sampler = sandSampler()
    const generator = new WorldGenerator({ seed: 7, chunkSize: 4 }, sampler)

    generator.generate(createChunkKey(0, 9, 0), generator.createBuffer())

    expect(sampler).not.toHaveBeenCalled()
    expect(generator.hasChunk(createChunkKey(0, 9, 0))).toBe(true)
  })

  it('does not keep a chunk whose generation failed', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const generator = new WorldGenerator({ seed: 7, chunkSize: 4 }, () => {
      throw new Error('noise unavailable')
    })
    const key = createChunkKey(3, 0, 3)

    expect(() => generator.generate(key, flatGround(generator, 0))).toThrow('noise unavailable')
    expect(generator.hasChunk(key)).toBe(false)
    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy.mock.calls[0][0]).toBe('Failed to generate chunk 3,0,3:')
  })

  it('drops the previous result when regeneration fails', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    let attribute = SAND_ATTRIBUTE
    const generator = new WorldGenerator({ seed: 7, chunkSize: 4 }, (_key, _seed, shape) =>
      new Float32Array(shape.area).fill(attribute)
    )
    const key = createChunkKey(0, 0, 0)

    generator.generate(key, flatGround(generator, 1))
    expect(generator.hasChunk(key)).toBe(true)

    attribute = Number.NaN
    expect(() => generator.generate(key, flatGround(generator, 1))).toThrow(RangeError)
    expect(generator.hasChunk(key)).toBe(false)
  })

  it('rejects a buffer with the wrong edge', () => {
    const generator = new WorldGenerator({ seed: 1, chunkSize: 8 }, sandSampler())

    expect(() => generator.generate(createChunkKey(0, 0, 0), VoxelBuffer.create(new ChunkShape(4)))).toThrow(
      'Chunk 0,0,0 buffer has edge 4, world uses 8'
    )
  })

  it('unloads and resets stored chunks', () => {
    const generator = new WorldGenerator({ seed: 1, chunkSize: 4 }, sandSampler())
    generator.generate(createChunkKey(0, 0, 0), flatGround(generator, 0))
    generator.generate(createChunkKey(1, 0, 0), flatGround(generator, 0))

    expect(generator.unloadChunk(createChunkKey(0, 0, 0))).toBe(true)
    expect(generator.unloadChunk(createChunkKey(0, 0, 0))).toBe(false)
    expect(generator.getGeneratedCount()).toBe(1)

    generator.reset()
    expect(generator.getGeneratedCount()).toBe(0)
  })

  it('accepts a prepared config', () => {
    const config = new GenerationConfig({ seed: 55, chunkSize: 16 })
    const generator = new WorldGenerator(config)

    expect(generator.getConfig()).toBe(config)
    expect(generator.createBuffer().shape.edge).toBe(16)
  })

  it('generates reproducibly with the default noise', () => {
    const first = new WorldGenerator({ seed: 321, chunkSize: 16 })
    const second = new WorldGenerator({ seed: 321, chunkSize: 16 })
    const key = createChunkKey(-2, 0, 4)

    const a = first.generate(key, flatGround(first, 5))
    const b = second.generate(key, flatGround(second, 5))

    expect(Array.from(a.getData())).toEqual(Array.from(b.getData()))
  })
})
