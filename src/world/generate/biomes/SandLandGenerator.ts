import { layDown, type BiomeColumnInfo, type IBiomeGenerator } from '../BiomeGenerator.ts'
import { VoxelIds } from '../../blocks/VoxelIds.ts'

const SAND_DEPTH = 3
const SANDSTONE_DEPTH = 1

/**
 * Desert: sand surface, a sand bed beneath it, then a sandstone crust.
 */
export const SandLandGenerator: IBiomeGenerator = {
  type: 'sand-land',

  genLandWithInfo({ voxels, chunkIndex, local }: BiomeColumnInfo): void {
    voxels.set(chunkIndex, VoxelIds.SAND)
    layDown(voxels, local, SAND_DEPTH + SANDSTONE_DEPTH, VoxelIds.SANDSTONE)
    layDown(voxels, local, SAND_DEPTH, VoxelIds.SAND)
  },
}
