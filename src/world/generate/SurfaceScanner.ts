import { isSolidVoxel } from '../blocks/VoxelIds.ts'
import type { VoxelBuffer } from '../chunks/VoxelBuffer.ts'

/**
 * Find the topmost solid voxel of every column.
 * Columns are visited x-fastest, then z; columns without a solid voxel are skipped.
 *
 * @returns Linear buffer indices of the surface voxels
 */
export function findSurfaceIndices(voxels: VoxelBuffer): number[] {
  const { edge } = voxels.shape
  const surface: number[] = []

  for (let z = 0; z < edge; z++) {
    for (let x = 0; x < edge; x++) {
      for (let y = edge - 1; y >= 0; y--) {
        if (isSolidVoxel(voxels.getAt(x, y, z))) {
          surface.push(voxels.shape.linearize3d(x, y, z))
          break
        }
      }
    }
  }

  return surface
}
