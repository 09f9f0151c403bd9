export * from './world/index.ts'
export * from './world/generate/index.ts'
export {
  attachChunkWorker,
  generateChunk,
  handleChunkGenerationRequest,
  CHUNK_WORKER_ROLE,
  type ChunkGenerationRequest,
  type ChunkGenerationResult,
  type ChunkGenerationError,
  type ChunkGenerationResponse,
} from './workers/ChunkGenerationWorker.ts'
