// Interfaces
export type {
  ChunkKey,
  ChunkKeyString,
  ILocalCoordinate,
  IPlaneCoordinate,
} from './interfaces/ICoordinates.ts'

// Constants and Enums
export { CHUNK_SIZE, CHUNK_VOLUME, CHUNK_AREA } from './interfaces/IChunk.ts'
export { VoxelIds, isSolidVoxel, type VoxelId } from './blocks/VoxelIds.ts'

// Coordinate utilities
export {
  ChunkShape,
  DEFAULT_CHUNK_SHAPE,
  chunkOrigin,
  localToWorld,
} from './coordinates/CoordinateUtils.ts'
export {
  createChunkKey,
  chunkKeysEqual,
  chunkKeyToString,
  parseChunkKey,
} from './interfaces/ICoordinates.ts'

// Storage
export { VoxelBuffer } from './chunks/VoxelBuffer.ts'
