import { describe, it, expect } from 'vitest'
import { VoxelBuffer } from '../world/chunks/VoxelBuffer.ts'
import { ChunkShape } from '../world/coordinates/CoordinateUtils.ts'
import { VoxelIds, isSolidVoxel } from '../world/blocks/VoxelIds.ts'

describe('VoxelBuffer', () => {
  it('is sized edge cubed and starts empty', () => {
    const voxels = VoxelBuffer.create(new ChunkShape(4))

    expect(voxels.length).toBe(64)
    expect(voxels.getData().every((id) => id === VoxelIds.EMPTY)).toBe(true)
  })

  it('rejects a backing array of the wrong size', () => {
    expect(() => new VoxelBuffer(new Uint16Array(10), new ChunkShape(2))).toThrow(
      'Voxel buffer holds 10 voxels, expected 8 for edge 2'
    )
  })

  it('reports whether a write changed the voxel', () => {
    const voxels = VoxelBuffer.create(new ChunkShape(2))

    expect(voxels.set(3, VoxelIds.SAND)).toBe(true)
    expect(voxels.set(3, VoxelIds.SAND)).toBe(false)
    expect(voxels.get(3)).toBe(VoxelIds.SAND)
  })

  it('addresses voxels through the chunk shape', () => {
    const voxels = VoxelBuffer.create(new ChunkShape(4))
    voxels.setAt(1, 2, 3, VoxelIds.SNOW)

    expect(voxels.get(2 * 16 + 3 * 4 + 1)).toBe(VoxelIds.SNOW)
    expect(voxels.getAt(1, 2, 3)).toBe(VoxelIds.SNOW)
  })

  it('throws on out-of-range access', () => {
    const voxels = VoxelBuffer.create(new ChunkShape(2))

    expect(() => voxels.get(8)).toThrow(RangeError)
    expect(() => voxels.set(-1, VoxelIds.STONE)).toThrow(RangeError)
    expect(() => voxels.getAt(2, 0, 0)).toThrow(RangeError)
  })

  it('shares the caller-owned array', () => {
    const data = new Uint16Array(8)
    const voxels = new VoxelBuffer(data, new ChunkShape(2))
    voxels.set(0, VoxelIds.DIRT)

    expect(data[0]).toBe(VoxelIds.DIRT)
    expect(voxels.getData()).toBe(data)
  })
})

describe('isSolidVoxel', () => {
  it('treats air and water as non-solid', () => {
    expect(isSolidVoxel(VoxelIds.EMPTY)).toBe(false)
    expect(isSolidVoxel(VoxelIds.WATER)).toBe(false)
    expect(isSolidVoxel(VoxelIds.STONE)).toBe(true)
    expect(isSolidVoxel(VoxelIds.SNOW)).toBe(true)
  })
})
