// Noise
export {
  WorleyNoise,
  type WorleyOptions,
  type WorleyDistance,
  type WorleyReturnType,
  type PlaneBounds,
} from './WorleyNoise.ts'
export {
  biomesNoise,
  createBiomeNoiseSampler,
  BIOME_NOISE_FREQUENCY,
  type BiomeNoiseSampler,
} from './BiomeNoise.ts'

// Configuration
export { GenerationConfig, type IGenerationConfig } from './GenerationConfig.ts'
export {
  WORLD_BASELINE,
  SEA_LEVEL,
  HIGH_ALTITUDE_LEVEL,
  MOUNTAIN_LEVEL,
  SNOW_LEVEL,
} from './HeightBands.ts'

// Generator contract
export {
  genLand,
  layDown,
  fillAbove,
  type BiomeType,
  type BiomeColumnInfo,
  type IBiomeGenerator,
} from './BiomeGenerator.ts'

// Biomes
export { BasicLandGenerator } from './biomes/BasicLandGenerator.ts'
export { DryLandGenerator } from './biomes/DryLandGenerator.ts'
export { SnowLandGenerator } from './biomes/SnowLandGenerator.ts'
export { SandLandGenerator } from './biomes/SandLandGenerator.ts'
export { BlueLandGenerator } from './biomes/BlueLandGenerator.ts'
export {
  BIOME_BANDS,
  selectBiomeType,
  selectGenerator,
  getGenerator,
  getAllBiomeTypes,
  type BiomeBand,
} from './biomes/BiomeRegistry.ts'

// Passes
export { findSurfaceIndices } from './SurfaceScanner.ts'
export { biomesGenerate } from './ChunkBiomeGenerator.ts'

// Main coordinator
export { WorldGenerator } from './WorldGenerator.ts'
