import { genLand } from './BiomeGenerator.ts'
import { biomesNoise, type BiomeNoiseSampler } from './BiomeNoise.ts'
import { selectGenerator } from './biomes/BiomeRegistry.ts'
import type { VoxelBuffer } from '../chunks/VoxelBuffer.ts'
import type { ChunkKey } from '../interfaces/ICoordinates.ts'

/**
 * Apply biome surface rules to every surface column of a chunk.
 *
 * Samples the biome attribute field once, then for each surface index picks a
 * biome from the column's attribute and lets it rewrite that column. Mutates
 * `voxels` in place. Any thrown error leaves the buffer partially written;
 * callers must discard it.
 *
 * @param surfaceIndices - Linear indices of each column's topmost solid voxel
 * @param sampler - Attribute field source, defaults to the Worley biome noise
 */
export function biomesGenerate(
  chunkKey: ChunkKey,
  seed: number,
  surfaceIndices: readonly number[],
  voxels: VoxelBuffer,
  sampler: BiomeNoiseSampler = biomesNoise
): void {
  if (surfaceIndices.length === 0) {
    return
  }

  const shape = voxels.shape
  const attributes = sampler(chunkKey, seed, shape)

  if (attributes.length !== shape.area) {
    throw new RangeError(
      `Biome attribute field has ${attributes.length} entries, expected ${shape.area}`
    )
  }

  for (const chunkIndex of surfaceIndices) {
    const { x, z } = shape.delinearize3d(chunkIndex)
    const planeIndex = shape.linearize2d(x, z)
    const generator = selectGenerator(attributes[planeIndex])
    genLand(generator, chunkKey, voxels, chunkIndex, planeIndex)
  }
}
