import { WorleyNoise } from './WorleyNoise.ts'
import { ChunkShape, DEFAULT_CHUNK_SHAPE, chunkOrigin } from '../coordinates/CoordinateUtils.ts'
import type { ChunkKey } from '../interfaces/ICoordinates.ts'

/**
 * Low frequency so one biome region spans several chunks.
 */
export const BIOME_NOISE_FREQUENCY = 0.008

/**
 * Produces the per-column biome attribute field for one chunk.
 * Result has shape.area entries, indexed by shape.linearize2d(x, z).
 */
export type BiomeNoiseSampler = (
  chunkKey: ChunkKey,
  seed: number,
  shape: ChunkShape
) => Float32Array

/**
 * Sample the biome attribute field for a chunk.
 * The window is offset by the chunk's world position, so neighbouring chunks
 * read contiguous parts of the same field.
 */
export function biomesNoise(
  chunkKey: ChunkKey,
  seed: number,
  shape: ChunkShape = DEFAULT_CHUNK_SHAPE,
  frequency: number = BIOME_NOISE_FREQUENCY
): Float32Array {
  const noise = new WorleyNoise(seed, {
    distance: 'euclidean',
    returnType: 'value',
    frequency,
  })

  const origin = chunkOrigin(chunkKey, shape)

  return noise.samplePlane({
    width: shape.edge,
    height: shape.edge,
    xBounds: [origin.x, origin.x + shape.edge],
    zBounds: [origin.z, origin.z + shape.edge],
  })
}

/**
 * Bind a noise frequency, e.g. from GenerationConfig.
 */
export function createBiomeNoiseSampler(frequency: number): BiomeNoiseSampler {
  return (chunkKey, seed, shape) => biomesNoise(chunkKey, seed, shape, frequency)
}
