/**
 * worker_threads entry for chunk biome generation.
 * Handles: surface scan and biome pass for one chunk per request.
 * Does NOT handle: base terrain (arrives filled in the request buffer) or meshing.
 *
 * Each request owns its buffer, so any number of these workers can run side by
 * side on different chunks.
 */

import { parentPort, workerData, type MessagePort } from 'node:worker_threads'
import { ChunkShape } from '../world/coordinates/CoordinateUtils.ts'
import { VoxelBuffer } from '../world/chunks/VoxelBuffer.ts'
import { createChunkKey } from '../world/interfaces/ICoordinates.ts'
import { biomesGenerate } from '../world/generate/ChunkBiomeGenerator.ts'
import { createBiomeNoiseSampler } from '../world/generate/BiomeNoise.ts'
import { findSurfaceIndices } from '../world/generate/SurfaceScanner.ts'

/**
 * Request sent to the chunk generation worker.
 */
export interface ChunkGenerationRequest {
  type: 'generate'
  id: number
  chunkX: number
  chunkY: number
  chunkZ: number
  seed: number
  chunkSize: number
  biomeNoiseFrequency: number
  voxels: Uint16Array
}

export interface ChunkGenerationResult {
  type: 'generated'
  id: number
  voxels: Uint16Array
  surfaceCount: number
}

/**
 * Failed generation. Carries no voxels: a half-written buffer is never handed back.
 */
export interface ChunkGenerationError {
  type: 'generate-error'
  id: number
  chunkX: number
  chunkY: number
  chunkZ: number
  error: string
}

export type ChunkGenerationResponse = ChunkGenerationResult | ChunkGenerationError

export function generateChunk(request: ChunkGenerationRequest): ChunkGenerationResult {
  const chunkKey = createChunkKey(request.chunkX, request.chunkY, request.chunkZ)
  const voxels = new VoxelBuffer(request.voxels, new ChunkShape(request.chunkSize))
  const surfaceIndices = findSurfaceIndices(voxels)

  biomesGenerate(
    chunkKey,
    request.seed,
    surfaceIndices,
    voxels,
    createBiomeNoiseSampler(request.biomeNoiseFrequency)
  )

  return {
    type: 'generated',
    id: request.id,
    voxels: voxels.getData(),
    surfaceCount: surfaceIndices.length,
  }
}

export function handleChunkGenerationRequest(request: ChunkGenerationRequest): ChunkGenerationResponse {
  try {
    return generateChunk(request)
  } catch (error) {
    const key = `${request.chunkX},${request.chunkY},${request.chunkZ}`
    console.error(`Chunk generation failed for ${key}:`, error)
    return {
      type: 'generate-error',
      id: request.id,
      chunkX: request.chunkX,
      chunkY: request.chunkY,
      chunkZ: request.chunkZ,
      error: String(error),
    }
  }
}

/**
 * Marker passed as `workerData` when spawning this file as a chunk worker.
 */
export const CHUNK_WORKER_ROLE = 'chunk-generation'

function isChunkWorker(data: unknown): boolean {
  return (
    typeof data === 'object' &&
    data !== null &&
    'role' in data &&
    data.role === CHUNK_WORKER_ROLE
  )
}

/**
 * Answer chunk generation requests arriving on `port`, transferring each
 * generated buffer back.
 */
export function attachChunkWorker(port: MessagePort): void {
  port.on('message', (request: ChunkGenerationRequest) => {
    const response = handleChunkGenerationRequest(request)

    if (response.type === 'generated' && response.voxels.buffer instanceof ArrayBuffer) {
      // Transfer the buffer back (zero-copy)
      port.postMessage(response, [response.voxels.buffer])
    } else {
      port.postMessage(response)
    }
  })
}

if (parentPort && isChunkWorker(workerData)) {
  attachChunkWorker(parentPort)
}
