import type { BiomeColumnInfo, IBiomeGenerator } from '../BiomeGenerator.ts'
import { MOUNTAIN_LEVEL } from '../HeightBands.ts'
import { VoxelIds } from '../../blocks/VoxelIds.ts'

/**
 * Grassland; bare stone above the mountain line. Touches only the surface voxel.
 */
export const BasicLandGenerator: IBiomeGenerator = {
  type: 'basic-land',

  genLandWithInfo({ voxels, chunkIndex, height }: BiomeColumnInfo): void {
    voxels.set(chunkIndex, height >= MOUNTAIN_LEVEL ? VoxelIds.STONE : VoxelIds.GRASS)
  },
}
