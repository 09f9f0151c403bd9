import { ChunkShape } from '../coordinates/CoordinateUtils.ts'
import { VoxelBuffer } from '../chunks/VoxelBuffer.ts'
import { chunkKeyToString, type ChunkKey, type ChunkKeyString } from '../interfaces/ICoordinates.ts'
import { createBiomeNoiseSampler, type BiomeNoiseSampler } from './BiomeNoise.ts'
import { biomesGenerate } from './ChunkBiomeGenerator.ts'
import { GenerationConfig, type IGenerationConfig } from './GenerationConfig.ts'
import { findSurfaceIndices } from './SurfaceScanner.ts'

/**
 * Coordinates biome generation for a world:
 * - Runs the surface scan and biome pass for each chunk
 * - Keeps finished chunk buffers by chunk key
 * - Never keeps a buffer whose generation failed
 */
export class WorldGenerator {
  private readonly config: GenerationConfig
  private readonly shape: ChunkShape
  private readonly sampler: BiomeNoiseSampler

  private readonly generatedChunks: Map<ChunkKeyString, VoxelBuffer> = new Map()

  constructor(config?: Partial<IGenerationConfig> | GenerationConfig, sampler?: BiomeNoiseSampler) {
    this.config = config instanceof GenerationConfig ? config : new GenerationConfig(config)
    this.shape = new ChunkShape(this.config.chunkSize)
    this.sampler = sampler ?? createBiomeNoiseSampler(this.config.biomeNoiseFrequency)
  }

  /**
   * Allocate an empty buffer sized for this world's chunks.
   */
  createBuffer(): VoxelBuffer {
    return VoxelBuffer.create(this.shape)
  }

  /**
   * Apply biomes to a chunk whose base terrain is already in `voxels`.
   * On success the buffer is stored under the chunk key and returned.
   */
  generate(chunkKey: ChunkKey, voxels: VoxelBuffer): VoxelBuffer {
    const key = chunkKeyToString(chunkKey)

    if (voxels.shape.edge !== this.shape.edge) {
      throw new Error(
        `Chunk ${key} buffer has edge ${voxels.shape.edge}, world uses ${this.shape.edge}`
      )
    }

    // A failed regeneration must not leave the old buffer cached
    this.generatedChunks.delete(key)

    try {
      const surfaceIndices = findSurfaceIndices(voxels)
      biomesGenerate(chunkKey, this.config.seed, surfaceIndices, voxels, this.sampler)
    } catch (error) {
      console.error(`Failed to generate chunk ${key}:`, error)
      throw error
    }

    this.generatedChunks.set(key, voxels)
    return voxels
  }

  getChunk(chunkKey: ChunkKey): VoxelBuffer | undefined {
    return this.generatedChunks.get(chunkKeyToString(chunkKey))
  }

  hasChunk(chunkKey: ChunkKey): boolean {
    return this.generatedChunks.has(chunkKeyToString(chunkKey))
  }

  /**
   * Forget a generated chunk. Returns true if it was stored.
   */
  unloadChunk(chunkKey: ChunkKey): boolean {
    return this.generatedChunks.delete(chunkKeyToString(chunkKey))
  }

  getConfig(): GenerationConfig {
    return this.config
  }

  /**
   * Drop all generated chunks (e.g., after seed change).
   */
  reset(): void {
    this.generatedChunks.clear()
  }

  getGeneratedCount(): number {
    return this.generatedChunks.size
  }
}
