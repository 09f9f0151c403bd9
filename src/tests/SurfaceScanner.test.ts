import { describe, it, expect } from 'vitest'
import { findSurfaceIndices } from '../world/generate/SurfaceScanner.ts'
import { ChunkShape } from '../world/coordinates/CoordinateUtils.ts'
import { VoxelBuffer } from '../world/chunks/VoxelBuffer.ts'
import { VoxelIds } from '../world/blocks/VoxelIds.ts'

describe('findSurfaceIndices', () => {
  it('finds the topmost solid voxel of each column', () => {
    const voxels = VoxelBuffer.create(new ChunkShape(4))
    for (let y = 0; y <= 2; y++) voxels.setAt(0, y, 0, VoxelIds.STONE)
    voxels.setAt(2, 0, 1, VoxelIds.STONE)
    for (let y = 1; y <= 3; y++) voxels.setAt(2, y, 1, VoxelIds.WATER)

    expect(findSurfaceIndices(voxels)).toEqual([32, 6])
  })

  it('uses the topmost voxel above an overhang', () => {
    const voxels = VoxelBuffer.create(new ChunkShape(4))
    voxels.setAt(1, 0, 0, VoxelIds.STONE)
    voxels.setAt(1, 3, 0, VoxelIds.DIRT)

    expect(findSurfaceIndices(voxels)).toEqual([voxels.shape.linearize3d(1, 3, 0)])
  })

  it('returns nothing for an empty chunk', () => {
    expect(findSurfaceIndices(VoxelBuffer.create(new ChunkShape(4)))).toEqual([])
  })
})
