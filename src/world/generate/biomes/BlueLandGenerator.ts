import { fillAbove, type BiomeColumnInfo, type IBiomeGenerator } from '../BiomeGenerator.ts'
import { SEA_LEVEL } from '../HeightBands.ts'
import { VoxelIds } from '../../blocks/VoxelIds.ts'

/**
 * Beach band above sea level where the surface is still sand.
 */
const SHORE_HEIGHT = 2

/**
 * Water-adjacent land: sea floor and shore are sand, submerged columns are
 * flooded up to sea level (within this chunk only).
 */
export const BlueLandGenerator: IBiomeGenerator = {
  type: 'blue-land',

  genLandWithInfo({ voxels, chunkIndex, height, local }: BiomeColumnInfo): void {
    if (height >= SEA_LEVEL + SHORE_HEIGHT) {
      voxels.set(chunkIndex, VoxelIds.GRASS)
      return
    }

    voxels.set(chunkIndex, VoxelIds.SAND)

    if (height < SEA_LEVEL) {
      // Sea level expressed as a local y in this chunk
      const seaLevelY = local.y + (SEA_LEVEL - height)
      fillAbove(voxels, local, seaLevelY, VoxelIds.WATER)
    }
  },
}
