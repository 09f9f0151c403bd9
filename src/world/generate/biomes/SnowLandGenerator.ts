import { layDown, type BiomeColumnInfo, type IBiomeGenerator } from '../BiomeGenerator.ts'
import { SEA_LEVEL, SNOW_LEVEL } from '../HeightBands.ts'
import { VoxelIds } from '../../blocks/VoxelIds.ts'

// Extra snow layers under the surface above the snow line
const SNOWPACK_DEPTH = 1

export const SnowLandGenerator: IBiomeGenerator = {
  type: 'snow-land',

  genLandWithInfo({ voxels, chunkIndex, height, local }: BiomeColumnInfo): void {
    if (height < SEA_LEVEL) {
      voxels.set(chunkIndex, VoxelIds.GRAVEL)
      return
    }

    voxels.set(chunkIndex, VoxelIds.SNOW)
    if (height >= SNOW_LEVEL) {
      layDown(voxels, local, SNOWPACK_DEPTH, VoxelIds.SNOW)
    }
  },
}
