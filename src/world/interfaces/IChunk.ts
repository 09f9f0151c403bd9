/**
 * Chunk dimensions constants. Chunks are cubes.
 */
export const CHUNK_SIZE = 32

/**
 * Total voxels in a chunk for array sizing.
 */
export const CHUNK_VOLUME = CHUNK_SIZE * CHUNK_SIZE * CHUNK_SIZE

/**
 * Columns in a chunk's horizontal footprint.
 */
export const CHUNK_AREA = CHUNK_SIZE * CHUNK_SIZE
