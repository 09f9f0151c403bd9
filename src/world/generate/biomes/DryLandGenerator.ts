import { layDown, type BiomeColumnInfo, type IBiomeGenerator } from '../BiomeGenerator.ts'
import { SEA_LEVEL } from '../HeightBands.ts'
import { VoxelIds } from '../../blocks/VoxelIds.ts'

const SUBSURFACE_DEPTH = 2

/**
 * Dry grass over packed dirt. Submerged columns are plain dirt.
 */
export const DryLandGenerator: IBiomeGenerator = {
  type: 'dry-land',

  genLandWithInfo({ voxels, chunkIndex, height, local }: BiomeColumnInfo): void {
    voxels.set(chunkIndex, height < SEA_LEVEL ? VoxelIds.DIRT : VoxelIds.DRY_GRASS)
    layDown(voxels, local, SUBSURFACE_DEPTH, VoxelIds.DIRT)
  },
}
